import { createLogger } from "../logging/logger"
import { describeError, extractErrorTag } from "../util/error-utils"
import { systemClock, type Clock } from "./clock"
import type { TimerQueue } from "./TimerQueue"

const log = createLogger("Timers")

/**
 * Runs a TimerQueue against wall-clock time with a single Node timeout
 * armed for the earliest due entry.
 */
export class NodeTimerDriver {
  private timeout: ReturnType<typeof setTimeout> | null = null
  private unsubscribe: (() => void) | null = null
  private running = false

  constructor(
    private readonly queue: TimerQueue,
    private readonly clock: Clock = systemClock
  ) {}

  start(): void {
    if (this.running) return
    this.running = true
    this.unsubscribe = this.queue.subscribe(() => this.arm())
    this.arm()
  }

  stop(): void {
    this.running = false
    this.unsubscribe?.()
    this.unsubscribe = null
    if (this.timeout) {
      clearTimeout(this.timeout)
      this.timeout = null
    }
  }

  get isRunning(): boolean {
    return this.running
  }

  private arm(): void {
    if (!this.running) return
    if (this.timeout) {
      clearTimeout(this.timeout)
      this.timeout = null
    }

    const next = this.queue.nextFireAt()
    if (next === null) return

    const delay = Math.max(0, next - this.clock.now())
    this.timeout = setTimeout(() => this.fire(), delay)
  }

  private fire(): void {
    this.timeout = null
    try {
      this.queue.runDue()
    } catch (error) {
      log.error(`Timer callback failed [${extractErrorTag(error)}]: ${describeError(error)}`)
    }
    this.arm()
  }
}
