/**
 * Source of the current time in milliseconds. Every timer in the core reads
 * time through this so tests can substitute a virtual clock.
 */
export interface Clock {
  now(): number
}

export const systemClock: Clock = {
  now: () => Date.now(),
}

/**
 * Clock that only moves when told to.
 */
export class VirtualClock implements Clock {
  private current: number

  constructor(start = 0) {
    this.current = start
  }

  now(): number {
    return this.current
  }

  set(ms: number): void {
    if (ms < this.current) {
      throw new Error(`VirtualClock cannot move backwards (${ms} < ${this.current})`)
    }
    this.current = ms
  }
}
