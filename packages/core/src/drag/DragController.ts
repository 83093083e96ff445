import { Data } from "effect"
import type { Point } from "@deskpet/shared"
import type { Clock } from "../scheduler/clock"
import type { PetWindow } from "../window/PetWindow"

export type PointerButton = "left" | "right" | "middle"

export interface DragSettings {
  /** Manhattan distance from the press point that counts as movement */
  readonly thresholdPx: number
  readonly clickMaxMs: number
  readonly snapMarginPx: number
}

export type ReleaseOutcome = Data.TaggedEnum<{
  Click: {}
  Drag: { readonly position: Point }
  LockedClick: {}
  Ignored: {}
}>

export const ReleaseOutcome = Data.taggedEnum<ReleaseOutcome>()

export interface DragControllerDeps {
  readonly window: PetWindow
  readonly clock: Clock
  readonly settings: DragSettings
  readonly isLocked: () => boolean
  readonly persistPosition: (position: Point) => void
  readonly onClick: () => void
  readonly onLockedClick: () => void
  readonly onContextMenu: (at: Point) => void
}

/**
 * Tells clicks from drags from clicks on a locked pet, and moves the window
 * live while a drag is in progress.
 */
export class DragController {
  private dragging = false
  private moved = false
  private pressedAt: number | null = null
  private pressPoint: Point = { x: 0, y: 0 }
  private offset: Point = { x: 0, y: 0 }

  constructor(private readonly deps: DragControllerDeps) {}

  get isDragging(): boolean {
    return this.dragging
  }

  get hasMoved(): boolean {
    return this.moved
  }

  press(button: PointerButton, pointer: Point): void {
    if (button === "right") {
      this.deps.onContextMenu(pointer)
      return
    }
    if (button !== "left") return

    this.moved = false
    this.pressedAt = this.deps.clock.now()

    if (this.deps.isLocked()) {
      this.dragging = false
      return
    }

    const origin = this.deps.window.position
    this.dragging = true
    this.pressPoint = { ...pointer }
    this.offset = { x: pointer.x - origin.x, y: pointer.y - origin.y }
  }

  /** Follows the pointer without clamping; release puts it back on screen. */
  move(pointer: Point): void {
    if (!this.dragging) return

    const distance =
      Math.abs(pointer.x - this.pressPoint.x) + Math.abs(pointer.y - this.pressPoint.y)
    if (distance > this.deps.settings.thresholdPx) this.moved = true

    this.deps.window.moveTo(pointer.x - this.offset.x, pointer.y - this.offset.y)
  }

  release(button: PointerButton): ReleaseOutcome {
    if (button !== "left" || this.pressedAt === null) return ReleaseOutcome.Ignored()

    const { window, clock, settings } = this.deps
    const isClick = clock.now() - this.pressedAt < settings.clickMaxMs
    this.pressedAt = null

    if (this.dragging) {
      this.dragging = false
      window.ensureOnScreen()
      window.snapToEdges(settings.snapMarginPx)
      this.deps.persistPosition(window.position)

      if (!this.moved && isClick) {
        this.deps.onClick()
        return ReleaseOutcome.Click()
      }
      return ReleaseOutcome.Drag({ position: window.position })
    }

    if (this.deps.isLocked() && isClick) {
      this.deps.onLockedClick()
      return ReleaseOutcome.LockedClick()
    }
    return ReleaseOutcome.Ignored()
  }

  /** Abandon a drag without snapping or persisting (window hidden mid-drag). */
  cancel(): void {
    this.dragging = false
    this.moved = false
    this.pressedAt = null
  }
}
