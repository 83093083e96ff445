import { Cause, Effect } from "effect"
import type { MissingAssetError, Rect } from "@deskpet/shared"
import { MonospaceTextMeasurer } from "../bubble/layout"
import type { PetConfigData } from "../config/PetConfig"
import { createLogger, setLogLevel } from "../logging/logger"
import { createPetController, type PetController } from "../PetController"
import { NodeTimerDriver } from "../scheduler/NodeTimerDriver"
import { TimerQueue } from "../scheduler/TimerQueue"
import { systemClock } from "../scheduler/clock"
import { JsonFileSettingsStore } from "../settings/JsonFileSettingsStore"
import { describeError, extractErrorTag } from "../util/error-utils"
import { StaticScreenGeometry } from "../window/ScreenGeometry"
import { GifFileLoader, LoggingBubbleSurface, LoggingWindowSurface } from "./headless"

const log = createLogger("Runtime")

/** Monitor assumed by the terminal runtime. */
export const HEADLESS_MONITOR: Rect = { x: 0, y: 0, width: 1920, height: 1080 }

export interface RunningPet {
  readonly controller: PetController
  readonly driver: NodeTimerDriver
}

/**
 * Wire the pet to wall-clock timers, the settings file and headless
 * surfaces, then start it.
 */
export const launchPet = (
  config: PetConfigData,
  monitors: readonly Rect[] = [HEADLESS_MONITOR]
): Effect.Effect<RunningPet, MissingAssetError> =>
  Effect.gen(function* () {
    setLogLevel(config.logLevel)

    const settings = yield* JsonFileSettingsStore.load(config.settingsFile)
    const queue = new TimerQueue(systemClock)
    const driver = new NodeTimerDriver(queue, systemClock)

    const controller = yield* createPetController({
      config,
      settings,
      queue,
      clock: systemClock,
      host: {
        screens: new StaticScreenGeometry(monitors),
        windowSurface: new LoggingWindowSurface(),
        bubbleSurface: new LoggingBubbleSurface(),
        measurer: new MonospaceTextMeasurer(),
        loader: new GifFileLoader(),
      },
    })

    controller.events.on("quit", () => driver.stop())
    controller.start()
    driver.start()
    return { controller, driver }
  })

/**
 * Log why startup failed, whether a typed failure or a thrown exception,
 * and yield the process exit code.
 */
export const reportStartupFailure = <E, R>(
  program: Effect.Effect<unknown, E, R>
): Effect.Effect<number, never, R> =>
  program.pipe(
    Effect.as(0),
    Effect.catchAllCause((cause) =>
      Effect.sync(() => {
        const error = Cause.squash(cause)
        log.error(`Could not start [${extractErrorTag(error)}]: ${describeError(error)}`)
        return 1
      })
    )
  )
