import { isWalkingPose, walkingPoseFor, type WalkDirection } from "@deskpet/shared"
import type { BubbleButton } from "../bubble/BubblePositioner"
import type { PetEventBus, PetEvents } from "../events/PetEventBus"
import { createLogger } from "../logging/logger"
import type { PetStateMachine } from "../pet/PetStateMachine"
import type { TimerQueue } from "../scheduler/TimerQueue"
import type { SettingsStore } from "../settings/SettingsStore"
import { Outcome } from "../util/outcome"
import { pickOne, randomDirection, randomInt, type RandomSource } from "../util/random"
import type { EdgeHit, WalkController } from "../walk/WalkController"
import { ENCOURAGE_LINES, REST_TIPS, onOff } from "./messages"
import {
  EdgeOutcome,
  IDLE_ROUNDTRIP,
  beginRoundtrip,
  registerEdgeHit,
  type RoundtripWalk,
} from "./roundtrip"

const log = createLogger("Scheduler")

// ============================================================================
// Timer keys
// ============================================================================

export const REST_PERIODIC_KEY = "rest:periodic"
export const REST_SNOOZE_KEY = "rest:snooze"
export const REST_POSE_BACK_KEY = "rest:pose-back"
export const CHATTER_KEY = "chatter"
export const AUTO_ROUNDTRIP_KEY = "roundtrip:auto"

export const REST_SNOOZE_MINUTES = 10

const MINUTE_MS = 60_000

// ============================================================================
// Types
// ============================================================================

export interface SchedulerTimings {
  readonly chatterMinMs: number
  readonly chatterMaxMs: number
  readonly chatterProbability: number
  readonly autoRoundtripMs: number
  readonly autoRestPoseMs: number
}

export interface BehaviorFlags {
  readonly restEnabled: boolean
  readonly chatterEnabled: boolean
  readonly autoRoundtripEnabled: boolean
  readonly restIntervalMinutes: number
}

export type Notify = (
  title: string,
  message: string,
  durationMs: number,
  buttons?: readonly BubbleButton[]
) => void

export interface BehaviorSchedulerDeps {
  readonly queue: TimerQueue
  readonly rng: RandomSource
  readonly timings: SchedulerTimings
  readonly settings: SettingsStore
  readonly pose: PetStateMachine
  readonly walk: WalkController
  readonly events: PetEventBus
  readonly isDragging: () => boolean
  readonly isVisible: () => boolean
  readonly isPomodoroRunning: () => boolean
  readonly isPomodoroOnBreak: () => boolean
  readonly notify: Notify
}

export interface RoundtripOptions {
  /** User-triggered walks announce themselves and explain refusals */
  readonly announce: boolean
}

// ============================================================================
// BehaviorScheduler
// ============================================================================

/**
 * Owns the timer-driven behaviors and the guards that decide whether each
 * may touch the pose when it fires. Also tracks the roundtrip walk, which
 * it alone may start, advance or finish.
 */
export class BehaviorScheduler {
  private roundtrip: RoundtripWalk = IDLE_ROUNDTRIP
  private restEnabled: boolean
  private chatterEnabled: boolean
  private autoRoundtripEnabled: boolean
  private restIntervalMinutes: number
  private started = false

  constructor(private readonly deps: BehaviorSchedulerDeps) {
    const { settings } = deps
    this.restEnabled = settings.get("rest_enabled")
    this.chatterEnabled = settings.get("chatter_enabled")
    this.autoRoundtripEnabled = settings.get("auto_roundtrip_enabled")
    this.restIntervalMinutes = settings.get("rest_interval_minutes")
  }

  get flags(): BehaviorFlags {
    return {
      restEnabled: this.restEnabled,
      chatterEnabled: this.chatterEnabled,
      autoRoundtripEnabled: this.autoRoundtripEnabled,
      restIntervalMinutes: this.restIntervalMinutes,
    }
  }

  get roundtripState(): RoundtripWalk {
    return this.roundtrip
  }

  start(): void {
    if (this.started) return
    this.started = true
    this.deps.events.on("pose:changed", this.onPoseChanged)
    this.applyRestState()
    this.applyChatterState()
    this.applyAutoRoundtripState()
  }

  stop(): void {
    const { queue, events } = this.deps
    this.started = false
    events.off("pose:changed", this.onPoseChanged)
    for (const key of [
      REST_PERIODIC_KEY,
      REST_SNOOZE_KEY,
      REST_POSE_BACK_KEY,
      CHATTER_KEY,
      AUTO_ROUNDTRIP_KEY,
    ]) {
      queue.cancel(key)
    }
  }

  // --------------------------------------------------------------------------
  // Timer (re)arming
  // --------------------------------------------------------------------------

  /** Drops any pending snooze and restarts the periodic reminder if enabled. */
  applyRestState(): void {
    const { queue } = this.deps
    queue.cancel(REST_SNOOZE_KEY)
    if (this.restEnabled) {
      queue.every(REST_PERIODIC_KEY, this.restIntervalMinutes * MINUTE_MS, () =>
        this.runRestReminder()
      )
    } else {
      queue.cancel(REST_PERIODIC_KEY)
    }
  }

  applyChatterState(): void {
    if (this.chatterEnabled) {
      this.scheduleChatter()
    } else {
      this.deps.queue.cancel(CHATTER_KEY)
    }
  }

  applyAutoRoundtripState(): void {
    const { queue, timings } = this.deps
    if (this.autoRoundtripEnabled) {
      queue.every(AUTO_ROUNDTRIP_KEY, timings.autoRoundtripMs, () => this.runAutoRoundtrip())
    } else {
      queue.cancel(AUTO_ROUNDTRIP_KEY)
    }
  }

  private scheduleChatter(): void {
    const { queue, rng, timings } = this.deps
    const delay = randomInt(rng, timings.chatterMinMs, timings.chatterMaxMs)
    queue.schedule(CHATTER_KEY, delay, () => this.runChatter())
  }

  // --------------------------------------------------------------------------
  // Rest reminder
  // --------------------------------------------------------------------------

  /**
   * Unconditional once enabled: clears any roundtrip, lies the pet down for
   * a while and asks for a break.
   */
  runRestReminder(): void {
    if (!this.restEnabled) return
    const { queue, rng, pose, timings } = this.deps

    log.info("Rest reminder")
    this.cancelRoundtrip()
    pose.setState("lyingDown")
    queue.schedule(REST_POSE_BACK_KEY, timings.autoRestPoseMs, () => this.returnFromRest())

    this.deps.notify("Rest time", pickOne(rng, REST_TIPS), 0, [
      { label: "Snooze 10 min", action: () => this.snoozeRest(REST_SNOOZE_MINUTES) },
    ])
  }

  private returnFromRest(): void {
    const { pose } = this.deps
    // Someone else already moved the pet on, or a pomodoro break owns the pose
    if (pose.pose !== "lyingDown" || this.deps.isPomodoroOnBreak()) return
    pose.setState("sitting")
  }

  snoozeRest(minutes: number): Outcome {
    if (minutes <= 0) {
      return Outcome.Refused({ notice: "Snooze needs a positive number of minutes." })
    }
    const { queue } = this.deps
    queue.cancel(REST_PERIODIC_KEY)
    queue.schedule(REST_SNOOZE_KEY, minutes * MINUTE_MS, () => this.resumeAfterSnooze())
    this.deps.notify("Snoozed", `Rest reminder paused for ${minutes} min.`, 2400)
    return Outcome.Applied()
  }

  private resumeAfterSnooze(): void {
    if (!this.restEnabled) return
    this.deps.queue.every(REST_PERIODIC_KEY, this.restIntervalMinutes * MINUTE_MS, () =>
      this.runRestReminder()
    )
  }

  // --------------------------------------------------------------------------
  // Chatter
  // --------------------------------------------------------------------------

  runChatter(): void {
    if (!this.chatterEnabled) return
    const { rng, timings } = this.deps

    if (this.deps.isVisible() && !this.deps.isDragging()) {
      if (rng.next() < timings.chatterProbability) {
        this.deps.notify("Keep going", pickOne(rng, ENCOURAGE_LINES), 2600)
      }
    }
    this.scheduleChatter()
  }

  // --------------------------------------------------------------------------
  // Roundtrip walks
  // --------------------------------------------------------------------------

  runAutoRoundtrip(): void {
    if (!this.autoRoundtripEnabled || this.deps.isDragging() || this.deps.isPomodoroRunning()) {
      return
    }
    if (this.deps.pose.pose !== "sitting") return

    const outcome = this.startRoundtrip(undefined, { announce: false })
    if (Outcome.$is("Applied")(outcome)) {
      this.deps.notify("Auto walk", "Been sitting a while, let's take a walk~", 2400)
    }
  }

  /**
   * Walk to one edge, turn, walk to the other, sit. Refused while dragging,
   * lying down, during a pomodoro, or when already walking.
   */
  startRoundtrip(direction: WalkDirection | undefined, options: RoundtripOptions): Outcome {
    const { pose, rng, events } = this.deps

    const refusal = this.roundtripRefusal()
    if (refusal !== null) {
      if (options.announce) this.deps.notify("Walk", refusal, 1800)
      return Outcome.Refused({ notice: refusal })
    }

    const startDirection = direction ?? randomDirection(rng)
    this.roundtrip = beginRoundtrip(startDirection)
    pose.setState(walkingPoseFor(startDirection))
    events.emit("roundtrip:started", { direction: startDirection })
    log.debug(`Roundtrip started heading ${startDirection < 0 ? "left" : "right"}`)

    if (options.announce) {
      this.deps.notify("Walk", "I'm going all the way to the side", 2600)
    }
    return Outcome.Applied()
  }

  private roundtripRefusal(): string | null {
    const current = this.deps.pose.pose
    if (this.deps.isDragging()) return "Put me down first."
    if (current === "lyingDown") return "I'm resting right now."
    if (this.deps.isPomodoroRunning()) return "Not during a pomodoro."
    if (isWalkingPose(current)) return "Already walking."
    return null
  }

  /** Edge contact reported by the walk controller. */
  handleEdge(hit: EdgeHit): void {
    const { walk, outcome } = registerEdgeHit(this.roundtrip)
    this.roundtrip = walk

    EdgeOutcome.$match(outcome, {
      Ignored: () => {},
      Reversed: ({ direction }) => {
        log.debug(`Reached the ${hit.side} edge, turning around`)
        this.deps.pose.setState(walkingPoseFor(direction))
      },
      Completed: () => this.finishRoundtrip(),
    })
  }

  private finishRoundtrip(): void {
    const { walk, pose, events } = this.deps
    this.roundtrip = IDLE_ROUNDTRIP
    walk.stop()
    pose.setState("sitting")
    events.emit("roundtrip:finished", {})
    this.deps.notify("Walk finished", "back to study~", 2200)
  }

  /** Preemption: clear the roundtrip without touching the pose. */
  cancelRoundtrip(): void {
    if (this.roundtrip.active) log.debug("Roundtrip cancelled")
    this.roundtrip = IDLE_ROUNDTRIP
  }

  // A roundtrip only lives while the pet walks; any other pose ends it.
  private readonly onPoseChanged = ({ to }: PetEvents["pose:changed"]): void => {
    if (this.roundtrip.active && !isWalkingPose(to)) this.cancelRoundtrip()
  }

  // --------------------------------------------------------------------------
  // Toggles
  // --------------------------------------------------------------------------

  toggleRest(): boolean {
    this.restEnabled = !this.restEnabled
    this.deps.settings.set("rest_enabled", this.restEnabled)
    this.applyRestState()
    this.deps.notify("Rest reminder", onOff(this.restEnabled), 2200)
    return this.restEnabled
  }

  toggleChatter(): boolean {
    this.chatterEnabled = !this.chatterEnabled
    this.deps.settings.set("chatter_enabled", this.chatterEnabled)
    this.applyChatterState()
    this.deps.notify("Random chatter", onOff(this.chatterEnabled), 2200)
    return this.chatterEnabled
  }

  toggleAutoRoundtrip(): boolean {
    this.autoRoundtripEnabled = !this.autoRoundtripEnabled
    this.deps.settings.set("auto_roundtrip_enabled", this.autoRoundtripEnabled)
    this.applyAutoRoundtripState()
    this.deps.notify("Auto walk", onOff(this.autoRoundtripEnabled), 2200)
    return this.autoRoundtripEnabled
  }

  setRestInterval(minutes: number): Outcome {
    if (!Number.isInteger(minutes) || minutes <= 0) {
      return Outcome.Refused({ notice: "Rest interval must be a whole number of minutes." })
    }
    this.restIntervalMinutes = minutes
    this.deps.settings.set("rest_interval_minutes", minutes)
    this.applyRestState()
    this.deps.notify("Rest reminder", `Every ${minutes} min.`, 2200)
    return Outcome.Applied()
  }
}
