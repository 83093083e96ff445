import { VirtualClock } from "./clock"
import { TimerQueue } from "./TimerQueue"

/**
 * Drives a TimerQueue against virtual time: `advanceBy` steps the clock to
 * each due entry in turn, so callbacks observe the time they were meant to
 * fire at.
 */
export class VirtualTimeDriver {
  readonly clock: VirtualClock
  readonly queue: TimerQueue

  constructor(start = 0) {
    this.clock = new VirtualClock(start)
    this.queue = new TimerQueue(this.clock)
  }

  now(): number {
    return this.clock.now()
  }

  advanceBy(ms: number): void {
    this.advanceTo(this.clock.now() + ms)
  }

  advanceTo(target: number): void {
    for (;;) {
      const next = this.queue.nextFireAt()
      if (next === null || next > target) break
      this.clock.set(Math.max(this.clock.now(), next))
      this.queue.runDue()
    }
    this.clock.set(Math.max(this.clock.now(), target))
  }
}
