import {
  clampRectInto,
  rectBottom,
  rectCenter,
  rectRight,
  type Point,
  type Rect,
  type Size,
} from "@deskpet/shared"
import type { ScreenGeometry } from "./ScreenGeometry"

/**
 * OS primitives for the frameless, always-on-top pet window.
 */
export interface WindowSurface {
  move(x: number, y: number): void
  resize(width: number, height: number): void
  show(): void
  hide(): void
}

type MoveListener = (position: Point) => void

/**
 * Single owner of the pet window's geometry and visibility. Every mutator
 * goes through here so position listeners (the bubble) always hear about it.
 */
export class PetWindow {
  private rect: Rect
  private visible = false
  private readonly moveListeners = new Set<MoveListener>()

  constructor(
    private readonly screens: ScreenGeometry,
    private readonly surface: WindowSurface,
    initial: Rect
  ) {
    this.rect = { ...initial }
  }

  get position(): Point {
    return { x: this.rect.x, y: this.rect.y }
  }

  get size(): Size {
    return { width: this.rect.width, height: this.rect.height }
  }

  get bounds(): Rect {
    return { ...this.rect }
  }

  get isVisible(): boolean {
    return this.visible
  }

  center(): Point {
    return rectCenter(this.rect)
  }

  /** Top-center of the sprite, where the speech bubble points. */
  headAnchor(): Point {
    return { x: this.rect.x + Math.floor(this.rect.width / 2), y: this.rect.y }
  }

  /** Available area of the monitor under the window's center. */
  availableRect(): Rect {
    return this.screens.availableRectAt(this.center())
  }

  onMoved(listener: MoveListener): () => void {
    this.moveListeners.add(listener)
    return () => {
      this.moveListeners.delete(listener)
    }
  }

  /** Unclamped move; callers that must stay on screen clamp first. */
  moveTo(x: number, y: number): void {
    this.rect = { ...this.rect, x, y }
    this.surface.move(x, y)
    for (const listener of this.moveListeners) listener(this.position)
  }

  resize(size: Size): void {
    if (size.width === this.rect.width && size.height === this.rect.height) return
    this.rect = { ...this.rect, width: size.width, height: size.height }
    this.surface.resize(size.width, size.height)
  }

  ensureOnScreen(): void {
    const clamped = clampRectInto(this.rect, this.availableRect())
    this.moveTo(clamped.x, clamped.y)
  }

  /**
   * Pull the window flush against any monitor edge within `margin`
   * pixels, each axis independently.
   */
  snapToEdges(margin: number): void {
    const area = this.availableRect()
    const { width, height } = this.rect
    let { x, y } = this.rect

    if (Math.abs(x - area.x) <= margin) {
      x = area.x
    }
    if (Math.abs(x + width - rectRight(area)) <= margin) {
      x = rectRight(area) - width
    }

    if (Math.abs(y - area.y) <= margin) {
      y = area.y
    }
    if (Math.abs(y + height - rectBottom(area)) <= margin) {
      y = rectBottom(area) - height
    }

    this.moveTo(x, y)
  }

  show(): void {
    this.visible = true
    this.surface.show()
  }

  hide(): void {
    this.visible = false
    this.surface.hide()
  }
}
