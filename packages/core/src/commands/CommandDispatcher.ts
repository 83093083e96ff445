import { Effect, Either, ParseResult, Schema } from "effect"
import {
  CommandResult,
  InvalidCommandError,
  PetCommandSchema,
  decodePetCommand,
  type PetCommand,
} from "@deskpet/shared"
import { createLogger } from "../logging/logger"
import type { PetController } from "../PetController"
import { describeError, extractErrorTag } from "../util/error-utils"
import { Outcome } from "../util/outcome"

const log = createLogger("Commands")

const decodePetCommandJson = Schema.decodeUnknownEither(Schema.parseJson(PetCommandSchema))

const fromOutcome = (command: PetCommand, outcome: Outcome): CommandResult =>
  Outcome.$match(outcome, {
    Applied: () => CommandResult.Done({ command: command._tag }),
    Refused: ({ notice }) => CommandResult.NoOp({ command: command._tag, notice }),
  })

const done = (command: PetCommand): CommandResult => CommandResult.Done({ command: command._tag })

function run(pet: PetController, command: PetCommand): CommandResult {
  switch (command._tag) {
    case "Show":
      pet.show()
      return done(command)
    case "Hide":
      pet.hideAll()
      return done(command)
    case "Sit":
      pet.sit()
      return done(command)
    case "LieDown":
      pet.lieDown()
      return done(command)
    case "TogglePose":
      pet.togglePose()
      return done(command)
    case "Motivate":
      pet.motivate()
      return done(command)
    case "WalkRoundtrip":
      return fromOutcome(command, pet.walkRoundtrip(command.direction))
    case "StartPomodoro":
      return fromOutcome(command, pet.pomodoro.start())
    case "StopPomodoro":
      return fromOutcome(command, pet.pomodoro.stop())
    case "PomodoroBreak":
      return fromOutcome(command, pet.pomodoro.forceBreak())
    case "PomodoroFocus":
      return fromOutcome(command, pet.pomodoro.forceWork())
    case "SnoozeRest":
      return fromOutcome(command, pet.scheduler.snoozeRest(command.minutes))
    case "ToggleAutoRoundtrip":
      pet.scheduler.toggleAutoRoundtrip()
      return done(command)
    case "ToggleRest":
      pet.scheduler.toggleRest()
      return done(command)
    case "ToggleChatter":
      pet.scheduler.toggleChatter()
      return done(command)
    case "ToggleLock":
      pet.toggleLock()
      return done(command)
    case "SetScale":
      pet.setScale(command.scale)
      return done(command)
    case "SetRestInterval":
      return fromOutcome(command, pet.scheduler.setRestInterval(command.minutes))
    case "Quit":
      pet.quit()
      return done(command)
    default: {
      const unreachable: never = command
      return CommandResult.Failed({ reason: `Unhandled command ${JSON.stringify(unreachable)}` })
    }
  }
}

/**
 * Run one decoded command. A handler that throws yields `Failed`; the
 * pet keeps running.
 */
export function dispatchCommand(pet: PetController, command: PetCommand): CommandResult {
  try {
    return run(pet, command)
  } catch (error) {
    const reason = describeError(error)
    log.error(`${command._tag} failed [${extractErrorTag(error)}]: ${reason}`)
    return CommandResult.Failed({ reason })
  }
}

const invalid = (error: ParseResult.ParseError): InvalidCommandError =>
  new InvalidCommandError({ reason: ParseResult.TreeFormatter.formatErrorSync(error) })

/**
 * Decode an untrusted payload (menu item, IPC message) and run it.
 */
export const dispatchRaw = (
  pet: PetController,
  raw: unknown
): Effect.Effect<CommandResult, InvalidCommandError> =>
  Effect.suspend((): Effect.Effect<CommandResult, InvalidCommandError> => {
    const decoded = decodePetCommand(raw)
    return Either.isLeft(decoded)
      ? Effect.fail(invalid(decoded.left))
      : Effect.sync(() => dispatchCommand(pet, decoded.right))
  })

/**
 * Same as `dispatchRaw` for one line of JSON text.
 */
export const dispatchJson = (
  pet: PetController,
  text: string
): Effect.Effect<CommandResult, InvalidCommandError> =>
  Effect.suspend((): Effect.Effect<CommandResult, InvalidCommandError> => {
    const decoded = decodePetCommandJson(text)
    return Either.isLeft(decoded)
      ? Effect.fail(invalid(decoded.left))
      : Effect.sync(() => dispatchCommand(pet, decoded.right))
  })
