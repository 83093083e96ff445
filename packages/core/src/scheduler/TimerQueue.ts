import type { Clock } from "./clock"

interface TimerEntry {
  readonly key: string
  readonly intervalMs: number | null
  readonly callback: () => void
  fireAt: number
  seq: number
  cancelled: boolean
}

/**
 * Every timer the companion runs (walk ticks, reminders, chatter, bubble
 * refresh, pomodoro ticks) lives in one queue ordered by fire time.
 *
 * Timers are stored under a string key; scheduling with a key that is
 * already active replaces the previous timer, and cancelling a key
 * guarantees its callback will not run. Entries due at the same instant run
 * in the order they were scheduled.
 */
export class TimerQueue {
  private readonly heap: TimerEntry[] = []
  private readonly byKey = new Map<string, TimerEntry>()
  private readonly listeners = new Set<() => void>()
  private nextSeq = 0

  constructor(private readonly clock: Clock) {}

  // -----------------------------------------------------------------------
  // Scheduling
  // -----------------------------------------------------------------------

  /** Run `callback` once, `delayMs` from now. */
  schedule(key: string, delayMs: number, callback: () => void): void {
    this.add(key, Math.max(0, delayMs), null, callback)
  }

  /** Run `callback` every `intervalMs`, first after one interval. */
  every(key: string, intervalMs: number, callback: () => void): void {
    const interval = Math.max(1, intervalMs)
    this.add(key, interval, interval, callback)
  }

  cancel(key: string): boolean {
    const existing = this.byKey.get(key)
    if (!existing) return false
    existing.cancelled = true
    this.byKey.delete(key)
    this.notify()
    return true
  }

  isActive(key: string): boolean {
    return this.byKey.has(key)
  }

  /** Milliseconds until `key` fires, or null when it is not scheduled. */
  remaining(key: string): number | null {
    const entry = this.byKey.get(key)
    return entry ? Math.max(0, entry.fireAt - this.clock.now()) : null
  }

  activeKeys(): string[] {
    return [...this.byKey.keys()]
  }

  /** Fire time of the earliest live entry. */
  nextFireAt(): number | null {
    this.dropCancelledHead()
    const head = this.heap[0]
    return head ? head.fireAt : null
  }

  clear(): void {
    for (const entry of this.byKey.values()) entry.cancelled = true
    this.byKey.clear()
    this.heap.length = 0
    this.notify()
  }

  /**
   * Subscribe to changes in the schedule (used by drivers to re-arm their
   * wake-up). Returns an unsubscribe function.
   */
  subscribe(listener: () => void): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  // -----------------------------------------------------------------------
  // Driving
  // -----------------------------------------------------------------------

  /**
   * Run every entry due at or before the current time, earliest first.
   * Recurring entries are re-queued before their callback runs, so a
   * callback may cancel or replace its own timer. A recurring entry that fell
   * more than one interval behind (the process was suspended) runs once and
   * moves to its first slot after now.
   */
  runDue(): number {
    let ran = 0
    const now = this.clock.now()

    for (;;) {
      this.dropCancelledHead()
      const head = this.heap[0]
      if (!head || head.fireAt > now) break

      this.pop()
      if (head.intervalMs !== null) {
        head.fireAt += head.intervalMs
        if (head.fireAt <= now) {
          head.fireAt += head.intervalMs * Math.ceil((now - head.fireAt + 1) / head.intervalMs)
        }
        head.seq = this.nextSeq++
        this.push(head)
      } else {
        this.byKey.delete(head.key)
      }

      ran++
      head.callback()
    }

    if (ran > 0) this.notify()
    return ran
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  private add(
    key: string,
    delayMs: number,
    intervalMs: number | null,
    callback: () => void
  ): void {
    const previous = this.byKey.get(key)
    if (previous) previous.cancelled = true

    const entry: TimerEntry = {
      key,
      intervalMs,
      callback,
      fireAt: this.clock.now() + delayMs,
      seq: this.nextSeq++,
      cancelled: false,
    }
    this.byKey.set(key, entry)
    this.push(entry)
    this.notify()
  }

  private notify(): void {
    for (const listener of this.listeners) listener()
  }

  private dropCancelledHead(): void {
    let head = this.heap[0]
    while (head && head.cancelled) {
      this.pop()
      head = this.heap[0]
    }
  }

  private before(a: TimerEntry, b: TimerEntry): boolean {
    return a.fireAt < b.fireAt || (a.fireAt === b.fireAt && a.seq < b.seq)
  }

  private push(entry: TimerEntry): void {
    const heap = this.heap
    heap.push(entry)
    let index = heap.length - 1
    while (index > 0) {
      const parentIndex = (index - 1) >> 1
      const parent = heap[parentIndex]
      if (!parent || !this.before(entry, parent)) break
      heap[index] = parent
      index = parentIndex
    }
    heap[index] = entry
  }

  private pop(): TimerEntry | undefined {
    const heap = this.heap
    const top = heap[0]
    const last = heap.pop()
    if (!top || !last || heap.length === 0) return top

    let index = 0
    for (;;) {
      const leftIndex = index * 2 + 1
      const rightIndex = leftIndex + 1
      const left = heap[leftIndex]
      const right = heap[rightIndex]
      if (!left) break

      const child = right && this.before(right, left) ? right : left
      const childIndex = child === right ? rightIndex : leftIndex
      if (!this.before(child, last)) break

      heap[index] = child
      index = childIndex
    }
    heap[index] = last
    return top
  }
}
