/**
 * Terminal entry point: runs the pet against wall-clock time and reads one
 * JSON command per line from stdin, e.g. {"_tag":"WalkRoundtrip"}.
 */

import { Effect } from "effect"
import { createInterface } from "node:readline"
import { CommandResult } from "@deskpet/shared"
import { dispatchJson } from "./commands/CommandDispatcher"
import { PetConfig, PetConfigLive } from "./config/PetConfig"
import { createLogger } from "./logging/logger"
import { launchPet, reportStartupFailure } from "./runtime/launch"
import { describeError, extractErrorTag } from "./util/error-utils"

const log = createLogger("Runtime")

const describeResult = CommandResult.$match({
  Done: ({ command }) => `${command}: done`,
  NoOp: ({ command, notice }) => `${command}: ${notice}`,
  Failed: ({ reason }) => `failed: ${reason}`,
})

const program = Effect.gen(function* () {
  const config = yield* PetConfig
  const { controller, driver } = yield* launchPet(config)

  const lines = createInterface({ input: process.stdin })

  lines.on("line", (line) => {
    if (line.trim() === "") return
    Effect.runSync(
      dispatchJson(controller, line).pipe(
        Effect.match({
          onFailure: (error) => log.warn(`[${extractErrorTag(error)}] ${describeError(error)}`),
          onSuccess: (result) => log.info(describeResult(result)),
        })
      )
    )
  })

  // stdin closing (Ctrl+D) quits, and so does the Quit command
  lines.on("close", () => {
    if (driver.isRunning) controller.quit()
  })
  controller.events.on("quit", () => lines.close())

  log.info(`Assets from ${config.assetsDir}, settings in ${config.settingsFile}`)
})

void Effect.runPromise(
  reportStartupFailure(program.pipe(Effect.provide(PetConfigLive))).pipe(
    Effect.map((exitCode) => {
      process.exitCode = exitCode
    })
  )
)
