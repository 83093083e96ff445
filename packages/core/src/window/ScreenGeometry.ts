import { containsPoint, type Point, type Rect } from "@deskpet/shared"

/**
 * Multi-monitor geometry supplied by the host.
 */
export interface ScreenGeometry {
  /**
   * Usable area (excluding task bars and docks) of the monitor under
   * `point`, or of the primary monitor when the point is off every screen.
   */
  availableRectAt(point: Point): Rect
}

/**
 * Fixed monitor layout. The first monitor is the primary one.
 */
export class StaticScreenGeometry implements ScreenGeometry {
  private readonly monitors: readonly Rect[]

  constructor(monitors: readonly Rect[]) {
    if (monitors.length === 0) {
      throw new Error("StaticScreenGeometry needs at least one monitor")
    }
    this.monitors = monitors
  }

  availableRectAt(point: Point): Rect {
    const match = this.monitors.find((monitor) => containsPoint(monitor, point))
    return match ?? this.primary()
  }

  private primary(): Rect {
    const [first] = this.monitors
    if (!first) throw new Error("No monitors configured")
    return first
  }
}
