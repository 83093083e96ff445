import { Data, Schema } from "effect"
import { WalkDirectionSchema } from "./pose"
import { ScalePresetSchema } from "./settings"

// ============================================================================
// Command Schemas
// ============================================================================
// The tray and context menu never call into the core directly; each item
// dispatches one of these named messages.

export const ShowCommand = Schema.TaggedStruct("Show", {})
export const HideCommand = Schema.TaggedStruct("Hide", {})

/** Sit down and announce a focus line. */
export const SitCommand = Schema.TaggedStruct("Sit", {})

/** Lie down and announce a short break. */
export const LieDownCommand = Schema.TaggedStruct("LieDown", {})

/** Swap between sitting and lying down (double-click). */
export const TogglePoseCommand = Schema.TaggedStruct("TogglePose", {})

export const MotivateCommand = Schema.TaggedStruct("Motivate", {})

export const WalkRoundtripCommand = Schema.TaggedStruct("WalkRoundtrip", {
  direction: Schema.optional(WalkDirectionSchema),
})

export const StartPomodoroCommand = Schema.TaggedStruct("StartPomodoro", {})
export const StopPomodoroCommand = Schema.TaggedStruct("StopPomodoro", {})
export const PomodoroBreakCommand = Schema.TaggedStruct("PomodoroBreak", {})
export const PomodoroFocusCommand = Schema.TaggedStruct("PomodoroFocus", {})

export const SnoozeRestCommand = Schema.TaggedStruct("SnoozeRest", {
  minutes: Schema.Number.pipe(Schema.int()),
})

export const ToggleAutoRoundtripCommand = Schema.TaggedStruct("ToggleAutoRoundtrip", {})
export const ToggleRestCommand = Schema.TaggedStruct("ToggleRest", {})
export const ToggleChatterCommand = Schema.TaggedStruct("ToggleChatter", {})
export const ToggleLockCommand = Schema.TaggedStruct("ToggleLock", {})

export const SetScaleCommand = Schema.TaggedStruct("SetScale", {
  scale: ScalePresetSchema,
})

export const SetRestIntervalCommand = Schema.TaggedStruct("SetRestInterval", {
  minutes: Schema.Number.pipe(Schema.int(), Schema.positive()),
})

export const QuitCommand = Schema.TaggedStruct("Quit", {})

export const PetCommandSchema = Schema.Union(
  ShowCommand,
  HideCommand,
  SitCommand,
  LieDownCommand,
  TogglePoseCommand,
  MotivateCommand,
  WalkRoundtripCommand,
  StartPomodoroCommand,
  StopPomodoroCommand,
  PomodoroBreakCommand,
  PomodoroFocusCommand,
  SnoozeRestCommand,
  ToggleAutoRoundtripCommand,
  ToggleRestCommand,
  ToggleChatterCommand,
  ToggleLockCommand,
  SetScaleCommand,
  SetRestIntervalCommand,
  QuitCommand
)

export type PetCommand = Schema.Schema.Type<typeof PetCommandSchema>

export type PetCommandTag = PetCommand["_tag"]

export const decodePetCommand = Schema.decodeUnknownEither(PetCommandSchema)

// ============================================================================
// Command Results
// ============================================================================

/**
 * Outcome of dispatching a command. `NoOp` carries the notice that was shown
 * to the user; `Failed` is reserved for commands that could not be decoded
 * or whose handler raised.
 */
export type CommandResult = Data.TaggedEnum<{
  Done: { readonly command: PetCommandTag }
  NoOp: { readonly command: PetCommandTag; readonly notice: string }
  Failed: { readonly reason: string }
}>

export const CommandResult = Data.taggedEnum<CommandResult>()

export const isDone = CommandResult.$is("Done")
export const isNoOp = CommandResult.$is("NoOp")
export const isFailed = CommandResult.$is("Failed")
