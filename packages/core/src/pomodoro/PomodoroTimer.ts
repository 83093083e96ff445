import type { PoseState } from "@deskpet/shared"
import type { BubbleButton } from "../bubble/BubblePositioner"
import type { TimerQueue } from "../scheduler/TimerQueue"
import { Outcome } from "../util/outcome"

export const POMODORO_TICK_KEY = "pomodoro:tick"
export const POMODORO_TICK_MS = 1000
export const POMODORO_SNOOZE_MINUTES = 10

export type PomodoroMode = "work" | "break"

export interface PomodoroState {
  readonly running: boolean
  readonly mode: PomodoroMode
  readonly secondsRemaining: number
}

export interface PomodoroDurations {
  readonly workSec: number
  readonly breakSec: number
}

/** Persistent bubble with buttons and a polled countdown line. */
export interface CountdownBubble {
  readonly title: string
  readonly message: string
  readonly buttons: readonly BubbleButton[]
  readonly dynamicSource: () => string
}

export interface PomodoroTimerDeps {
  readonly queue: TimerQueue
  readonly durations: PomodoroDurations
  readonly setPose: (pose: PoseState) => void
  readonly notify: (title: string, message: string, durationMs: number) => void
  readonly showCountdown: (bubble: CountdownBubble) => void
  readonly snoozeRest: (minutes: number) => void
}

/** "MM:SS", minutes not wrapped at an hour. */
export const formatMinutesSeconds = (totalSeconds: number): string => {
  const seconds = Math.max(0, Math.floor(totalSeconds))
  const mm = String(Math.floor(seconds / 60)).padStart(2, "0")
  const ss = String(seconds % 60).padStart(2, "0")
  return `${mm}:${ss}`
}

/**
 * Work/break countdown. While running it decides the pose at each phase
 * change; other behaviors check `isRunning` before touching the pose.
 */
export class PomodoroTimer {
  private running = false
  private mode: PomodoroMode = "work"
  private remaining = 0

  constructor(private readonly deps: PomodoroTimerDeps) {}

  get state(): PomodoroState {
    return { running: this.running, mode: this.mode, secondsRemaining: this.remaining }
  }

  get isRunning(): boolean {
    return this.running
  }

  get isOnBreak(): boolean {
    return this.running && this.mode === "break"
  }

  start(): Outcome {
    if (this.running) return this.refuse("Already running.")

    this.running = true
    this.mode = "work"
    this.remaining = this.deps.durations.workSec
    this.deps.setPose("sitting")
    this.deps.queue.every(POMODORO_TICK_KEY, POMODORO_TICK_MS, () => this.tick())
    this.showCountdown()
    return Outcome.Applied()
  }

  stop(): Outcome {
    this.deps.queue.cancel(POMODORO_TICK_KEY)
    this.running = false
    this.deps.notify("Pomodoro", "Stopped.", 2000)
    return Outcome.Applied()
  }

  forceBreak(): Outcome {
    if (!this.running) return this.refuse("Start it first.")

    this.mode = "break"
    this.remaining = this.deps.durations.breakSec
    this.deps.setPose("lyingDown")
    this.deps.notify("Break", "Starting break now.", 1800)
    this.showCountdown()
    return Outcome.Applied()
  }

  forceWork(): Outcome {
    if (!this.running) return this.refuse("Start it first.")

    this.mode = "work"
    this.remaining = this.deps.durations.workSec
    this.deps.setPose("sitting")
    this.deps.notify("Focus", "Back to work.", 1800)
    this.showCountdown()
    return Outcome.Applied()
  }

  /** One second of countdown; flips the phase when it reaches zero. */
  tick(): void {
    if (!this.running) return

    this.remaining -= 1
    if (this.remaining > 0) return

    if (this.mode === "work") {
      this.mode = "break"
      this.remaining = this.deps.durations.breakSec
      this.deps.setPose("lyingDown")
      this.deps.notify("Time's up", "Nice work. Break time starts now.", 2600)
    } else {
      this.mode = "work"
      this.remaining = this.deps.durations.workSec
      this.deps.setPose("sitting")
      this.deps.notify("Time's up", "Break over. Back to focus.", 2600)
    }
    this.showCountdown()
  }

  countdownLine(): string {
    if (!this.running) return ""
    const label = this.mode === "work" ? "Focus" : "Break"
    return `${label}: ${formatMinutesSeconds(this.remaining)} remaining`
  }

  private refuse(notice: string): Outcome {
    this.deps.notify("Pomodoro", notice, 1800)
    return Outcome.Refused({ notice })
  }

  private showCountdown(): void {
    if (!this.running) return

    const snooze: BubbleButton = {
      label: "Snooze 10 min",
      action: () => this.deps.snoozeRest(POMODORO_SNOOZE_MINUTES),
    }

    const bubble: CountdownBubble =
      this.mode === "work"
        ? {
            title: "Focus time",
            message: "Write one small piece: one sentence or one citation.",
            buttons: [{ label: "Start break", action: () => this.forceBreak() }, snooze],
            dynamicSource: () => this.countdownLine(),
          }
        : {
            title: "Break time",
            message: "Stand up. Stretch your neck & shoulders.",
            buttons: [{ label: "Back to focus", action: () => this.forceWork() }, snooze],
            dynamicSource: () => this.countdownLine(),
          }

    this.deps.showCountdown(bubble)
  }
}
