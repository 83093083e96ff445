import { clampSpan, rectBottom, rectRight, type WalkDirection } from "@deskpet/shared"
import type { Clock } from "../scheduler/clock"
import type { TimerQueue } from "../scheduler/TimerQueue"
import type { PetWindow } from "../window/PetWindow"

export const WALK_TICK_KEY = "walk:tick"

export interface WalkSettings {
  readonly speedPxPerSec: number
  readonly tickMs: number
  readonly bobPx: number
  readonly bobPeriodMs: number
}

/**
 * Reported when a tick had to clamp X against a monitor edge.
 */
export interface EdgeHit {
  readonly side: "left" | "right"
  /** Direction the pet was walking when it hit the edge */
  readonly direction: WalkDirection
}

export interface WalkControllerDeps {
  readonly window: PetWindow
  readonly clock: Clock
  readonly queue: TimerQueue
  readonly settings: WalkSettings
  readonly isDragging: () => boolean
  readonly onEdge: (hit: EdgeHit) => void
}

/**
 * Horizontal walking with a fractional step accumulator and an optional
 * vertical bob around the pre-walk baseline.
 */
export class WalkController {
  private direction: WalkDirection | null = null
  private stepAccumulator = 0
  private baseY: number | null = null
  private startedAt = 0
  private travelled = 0

  constructor(private readonly deps: WalkControllerDeps) {}

  get isWalking(): boolean {
    return this.direction !== null
  }

  /** Whole pixels moved since the controller was created. */
  get distanceTravelled(): number {
    return this.travelled
  }

  /**
   * Begin walking, or turn around if already walking. Turning keeps the
   * pre-walk baseline and bob phase.
   */
  start(direction: WalkDirection): void {
    const { window, clock, queue, settings } = this.deps
    const alreadyWalking = this.direction !== null
    this.direction = direction
    if (alreadyWalking) return

    this.stepAccumulator = 0
    this.baseY = window.position.y
    this.startedAt = clock.now()
    queue.every(WALK_TICK_KEY, settings.tickMs, () => this.tick())
  }

  /**
   * Bob around the window's current Y from now on. Called when the pet is
   * dropped mid-walk.
   */
  rebaseline(): void {
    if (this.direction !== null) this.baseY = this.deps.window.position.y
  }

  /**
   * Stop walking and put Y back on the baseline exactly.
   */
  stop(): void {
    const { window, queue } = this.deps
    this.direction = null
    this.stepAccumulator = 0
    queue.cancel(WALK_TICK_KEY)

    if (this.baseY !== null) {
      const baseY = this.baseY
      this.baseY = null
      window.moveTo(window.position.x, baseY)
    }
  }

  tick(): void {
    const direction = this.direction
    if (direction === null || this.deps.isDragging()) return

    const { window, clock, settings } = this.deps

    this.stepAccumulator += settings.speedPxPerSec * (settings.tickMs / 1000)
    const whole = Math.floor(this.stepAccumulator)
    if (whole <= 0) return
    this.stepAccumulator -= whole
    this.travelled += whole

    // Re-resolved every tick: the walk may have crossed onto another monitor
    const area = window.availableRect()
    const { width, height } = window.size
    const minX = area.x
    const maxX = rectRight(area) - width

    let nextX = window.position.x + whole * direction
    let nextY = window.position.y

    if (settings.bobPx > 0 && settings.bobPeriodMs > 0 && this.baseY !== null) {
      const elapsed = clock.now() - this.startedAt
      const phase = (2 * Math.PI * (elapsed % settings.bobPeriodMs)) / settings.bobPeriodMs
      nextY = this.baseY + Math.round(Math.sin(phase) * settings.bobPx)
    }
    nextY = clampSpan(nextY, height, area.y, rectBottom(area))

    let side: EdgeHit["side"] | null = null
    if (nextX <= minX) {
      nextX = minX
      side = "left"
    } else if (nextX >= maxX) {
      nextX = maxX
      side = "right"
    }

    window.moveTo(nextX, nextY)

    if (side !== null) {
      this.deps.onEdge({ side, direction })
    }
  }
}
