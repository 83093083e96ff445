import { Effect } from "effect"
import {
  MAX_SCALE,
  MIN_SCALE,
  type MissingAssetError,
  type PetCommand,
  type CommandResult,
  type Point,
  type PoseState,
  type Rect,
  type ScalePreset,
  type Size,
  type WalkDirection,
} from "@deskpet/shared"
import {
  loadAnimationSet,
  resolveAssetPaths,
  type AnimationLoader,
  type AnimationSet,
} from "./animation/AnimationSet"
import { BehaviorScheduler, type BehaviorFlags } from "./behaviors/BehaviorScheduler"
import { ENCOURAGE_LINES } from "./behaviors/messages"
import type { RoundtripWalk } from "./behaviors/roundtrip"
import {
  BubblePositioner,
  type BubbleButton,
  type BubbleModel,
  type BubbleSurface,
} from "./bubble/BubblePositioner"
import type { TextMeasurer } from "./bubble/layout"
import { dispatchCommand } from "./commands/CommandDispatcher"
import type { PetConfigData } from "./config/PetConfig"
import { DragController, type PointerButton, type ReleaseOutcome } from "./drag/DragController"
import { PetEventBus } from "./events/PetEventBus"
import { createLogger } from "./logging/logger"
import { PetStateMachine } from "./pet/PetStateMachine"
import { PomodoroTimer, type PomodoroState } from "./pomodoro/PomodoroTimer"
import type { Clock } from "./scheduler/clock"
import type { TimerQueue } from "./scheduler/TimerQueue"
import type { SettingsStore } from "./settings/SettingsStore"
import type { Outcome } from "./util/outcome"
import { mathRandom, pickOne, type RandomSource } from "./util/random"
import { WalkController } from "./walk/WalkController"
import { PetWindow, type WindowSurface } from "./window/PetWindow"
import type { ScreenGeometry } from "./window/ScreenGeometry"

const log = createLogger("Pet")

export const STARTUP_ON_SCREEN_KEY = "startup:on-screen"
export const STARTUP_GREETING_KEY = "startup:greeting"
export const DEFAULT_NOTIFY_MS = 3200
export const WHEEL_SCALE_STEP = 1.1

// ============================================================================
// Host contract
// ============================================================================

/**
 * What the embedding program provides: screens, the two overlay windows,
 * text metrics and the animation decoder.
 */
export interface PetHost {
  readonly screens: ScreenGeometry
  readonly windowSurface: WindowSurface
  readonly bubbleSurface: BubbleSurface
  readonly measurer: TextMeasurer
  readonly loader: AnimationLoader
}

export interface PetControllerOptions {
  readonly config: PetConfigData
  readonly host: PetHost
  readonly settings: SettingsStore
  readonly queue: TimerQueue
  readonly clock: Clock
  readonly rng?: RandomSource
  readonly events?: PetEventBus
}

export interface ActivityFlags {
  readonly dragging: boolean
  readonly locked: boolean
  readonly chatterEnabled: boolean
  readonly restEnabled: boolean
  readonly autoRoundtripEnabled: boolean
}

export interface PetSnapshot {
  readonly pose: PoseState
  readonly bounds: Rect
  readonly visible: boolean
  readonly scale: number
  readonly flags: ActivityFlags
  readonly behavior: BehaviorFlags
  readonly roundtrip: RoundtripWalk
  readonly pomodoro: PomodoroState
  readonly bubble: BubbleModel
}

const clampScale = (scale: number): number => Math.max(MIN_SCALE, Math.min(scale, MAX_SCALE))

// ============================================================================
// PetController
// ============================================================================

/**
 * The one place every component is wired together. Hosts talk to the pet
 * through commands, pointer events and the event bus.
 */
export class PetController {
  readonly events: PetEventBus
  readonly window: PetWindow
  readonly bubble: BubblePositioner
  readonly walk: WalkController
  readonly stateMachine: PetStateMachine
  readonly pomodoro: PomodoroTimer
  readonly scheduler: BehaviorScheduler
  readonly drag: DragController

  private readonly rng: RandomSource
  private scale: number
  private locked: boolean
  private started = false

  constructor(
    private readonly options: PetControllerOptions,
    private readonly animations: AnimationSet
  ) {
    const { config, host, settings, queue, clock } = options
    this.rng = options.rng ?? mathRandom
    this.events = options.events ?? new PetEventBus()
    this.scale = clampScale(settings.get("scale"))
    this.locked = settings.get("locked")

    const position = settings.get("position")
    this.window = new PetWindow(host.screens, host.windowSurface, {
      x: position.x,
      y: position.y,
      width: 0,
      height: 0,
    })

    this.bubble = new BubblePositioner({
      screens: host.screens,
      surface: host.bubbleSurface,
      measurer: host.measurer,
      queue,
      events: this.events,
    })

    this.window.onMoved((point) => {
      this.bubble.updateAnchor(this.window.headAnchor())
      this.events.emit("window:moved", point)
    })

    this.walk = new WalkController({
      window: this.window,
      clock,
      queue,
      settings: {
        speedPxPerSec: config.walkSpeedPxPerSec,
        tickMs: config.walkTickMs,
        bobPx: config.walkBobPx,
        bobPeriodMs: config.walkBobPeriodMs,
      },
      isDragging: () => this.drag.isDragging,
      onEdge: (hit) => this.scheduler.handleEdge(hit),
    })

    this.stateMachine = new PetStateMachine({
      animations,
      walk: this.walk,
      events: this.events,
      rescale: () => this.applyScale(),
      notify: (title, message, durationMs) => this.notify(title, message, durationMs),
    })

    this.pomodoro = new PomodoroTimer({
      queue,
      durations: { workSec: config.pomodoroWorkSec, breakSec: config.pomodoroBreakSec },
      setPose: (pose) => this.stateMachine.setState(pose),
      notify: (title, message, durationMs) => this.notify(title, message, durationMs),
      showCountdown: (countdown) =>
        this.bubble.show({
          ...countdown,
          anchor: this.window.headAnchor(),
          durationMs: 0,
          refreshIntervalMs: 1000,
        }),
      snoozeRest: (minutes) => {
        this.scheduler.snoozeRest(minutes)
      },
    })

    this.scheduler = new BehaviorScheduler({
      queue,
      rng: this.rng,
      timings: {
        chatterMinMs: config.chatterMinMs,
        chatterMaxMs: config.chatterMaxMs,
        chatterProbability: config.chatterProbability,
        autoRoundtripMs: config.autoRoundtripMs,
        autoRestPoseMs: config.autoRestPoseMs,
      },
      settings,
      pose: this.stateMachine,
      walk: this.walk,
      events: this.events,
      isDragging: () => this.drag.isDragging,
      isVisible: () => this.window.isVisible,
      isPomodoroRunning: () => this.pomodoro.isRunning,
      isPomodoroOnBreak: () => this.pomodoro.isOnBreak,
      notify: (title, message, durationMs, buttons) =>
        this.notify(title, message, durationMs, buttons),
    })

    this.drag = new DragController({
      window: this.window,
      clock,
      settings: {
        thresholdPx: config.dragThresholdPx,
        clickMaxMs: config.clickMaxMs,
        snapMarginPx: config.snapMarginPx,
      },
      isLocked: () => this.locked,
      persistPosition: (point) => {
        this.walk.rebaseline()
        settings.set("position", point)
      },
      onClick: () => this.notify("Focus", pickOne(this.rng, ENCOURAGE_LINES), 2400),
      onLockedClick: () => this.notify("Locked", "Right click to unlock.", 2200),
      onContextMenu: (at) => this.events.emit("menu:open", at),
    })
  }

  // --------------------------------------------------------------------------
  // Lifecycle
  // --------------------------------------------------------------------------

  /**
   * Restore the saved position, sit, arm the behaviors and show the pet.
   */
  start(): void {
    if (this.started) return
    this.started = true
    const { queue, config, settings } = this.options

    const position = settings.get("position")
    this.window.moveTo(position.x, position.y)
    this.stateMachine.setState("sitting")
    this.scheduler.start()

    queue.schedule(STARTUP_ON_SCREEN_KEY, config.onScreenCheckDelayMs, () =>
      this.window.ensureOnScreen()
    )
    queue.schedule(STARTUP_GREETING_KEY, config.greetingDelayMs, () =>
      this.notify("Hello", "I'm your desk pet 🐶", DEFAULT_NOTIFY_MS)
    )

    this.show()
    log.info(`Started at ${position.x},${position.y}`)
  }

  /** Stop every timer and animation and announce the exit. */
  quit(): void {
    const { queue } = this.options
    this.scheduler.stop()
    queue.clear()
    this.animations.stopAll()
    this.bubble.hide()
    this.started = false
    this.events.emit("quit", {})
    log.info("Quit")
  }

  dispatch(command: PetCommand): CommandResult {
    return dispatchCommand(this, command)
  }

  // --------------------------------------------------------------------------
  // Visibility and notifications
  // --------------------------------------------------------------------------

  show(): void {
    this.window.show()
    this.window.ensureOnScreen()
  }

  /** Hide the pet and its bubble; an in-progress drag is abandoned. */
  hideAll(): void {
    this.drag.cancel()
    this.window.hide()
    this.bubble.hide()
  }

  notify(
    title: string,
    message: string,
    durationMs: number = DEFAULT_NOTIFY_MS,
    buttons?: readonly BubbleButton[]
  ): void {
    this.bubble.show({
      title,
      message,
      anchor: this.window.headAnchor(),
      durationMs,
      buttons,
    })
    this.events.emit("notify", { title, message })
  }

  motivate(): void {
    this.notify("Keep going", pickOne(this.rng, ENCOURAGE_LINES), 2400)
  }

  // --------------------------------------------------------------------------
  // Poses
  // --------------------------------------------------------------------------

  sit(): void {
    this.stateMachine.setState("sitting", {
      announce: true,
      title: "Focus",
      text: pickOne(this.rng, ENCOURAGE_LINES),
    })
  }

  lieDown(): void {
    this.stateMachine.setState("lyingDown", {
      announce: true,
      title: "Break",
      text: "Take 60 seconds. Roll your shoulders.",
    })
  }

  togglePose(): void {
    if (this.stateMachine.pose === "sitting") {
      this.stateMachine.setState("lyingDown", {
        announce: true,
        title: "Break",
        text: "Quick break. Breathe in, breathe out.",
      })
    } else {
      this.stateMachine.setState("sitting", {
        announce: true,
        title: "Focus",
        text: "Back to it. One small step.",
      })
    }
  }

  // --------------------------------------------------------------------------
  // Scale and lock
  // --------------------------------------------------------------------------

  /**
   * Size the window to the uniform base size times the current scale and
   * push the size to every animation.
   */
  applyScale(): void {
    const base = this.animations.baseSize
    if (base === null) return

    this.scale = clampScale(this.scale)
    const size: Size = {
      width: Math.floor(base.width * this.scale),
      height: Math.floor(base.height * this.scale),
    }
    this.window.resize(size)
    this.animations.applyRenderedSize(size)

    const { settings } = this.options
    if (settings.get("scale") !== this.scale) settings.set("scale", this.scale)

    if (!this.drag.isDragging) this.window.ensureOnScreen()
  }

  setScale(scale: ScalePreset): void {
    this.scale = scale
    this.applyScale()
  }

  /** Wheel up grows, wheel down shrinks. Ignored until frame sizes are known. */
  wheel(deltaY: number): void {
    if (this.animations.baseSize === null || deltaY === 0) return
    this.scale *= deltaY > 0 ? WHEEL_SCALE_STEP : 1 / WHEEL_SCALE_STEP
    this.applyScale()
  }

  toggleLock(): boolean {
    this.locked = !this.locked
    this.options.settings.set("locked", this.locked)
    this.notify(
      "Lock",
      this.locked ? "Locked 🔒 (no dragging)" : "Unlocked 🔓 (dragging enabled)",
      2400
    )
    return this.locked
  }

  // --------------------------------------------------------------------------
  // Pointer input
  // --------------------------------------------------------------------------

  pointerDown(button: PointerButton, at: Point): void {
    this.drag.press(button, at)
  }

  pointerMove(at: Point): void {
    this.drag.move(at)
  }

  pointerUp(button: PointerButton): ReleaseOutcome {
    return this.drag.release(button)
  }

  doubleClick(button: PointerButton): void {
    if (button === "left") this.togglePose()
  }

  // --------------------------------------------------------------------------
  // Roundtrip shortcut
  // --------------------------------------------------------------------------

  walkRoundtrip(direction?: WalkDirection): Outcome {
    return this.scheduler.startRoundtrip(direction, { announce: true })
  }

  // --------------------------------------------------------------------------
  // State
  // --------------------------------------------------------------------------

  get currentScale(): number {
    return this.scale
  }

  get flags(): ActivityFlags {
    const behavior = this.scheduler.flags
    return {
      dragging: this.drag.isDragging,
      locked: this.locked,
      chatterEnabled: behavior.chatterEnabled,
      restEnabled: behavior.restEnabled,
      autoRoundtripEnabled: behavior.autoRoundtripEnabled,
    }
  }

  snapshot(): PetSnapshot {
    return {
      pose: this.stateMachine.pose,
      bounds: this.window.bounds,
      visible: this.window.isVisible,
      scale: this.scale,
      flags: this.flags,
      behavior: this.scheduler.flags,
      roundtrip: this.scheduler.roundtripState,
      pomodoro: this.pomodoro.state,
      bubble: this.bubble.model,
    }
  }
}

// ============================================================================
// Factory
// ============================================================================

/**
 * Load every pose animation and build the controller. Fails with
 * MissingAssetError before anything is shown when an asset is absent.
 */
export const createPetController = (
  options: PetControllerOptions
): Effect.Effect<PetController, MissingAssetError> =>
  loadAnimationSet(options.host.loader, resolveAssetPaths(options.config.assetsDir), {
    idle: options.config.idlePlaybackSpeed,
    walk: options.config.walkPlaybackSpeed,
  }).pipe(
    Effect.tap((animations) =>
      Effect.sync(() => {
        const base = animations.baseSize
        log.debug(`Loaded animations, base size ${base ? `${base.width}x${base.height}` : "unknown"}`)
      })
    ),
    Effect.map((animations) => new PetController(options, animations))
  )
