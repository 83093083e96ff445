import { Schema } from "effect"

// ============================================================================
// Geometry Schemas
// ============================================================================

/**
 * A point in virtual-desktop coordinates (spans every monitor).
 */
export const PointSchema = Schema.Struct({
  x: Schema.Number,
  y: Schema.Number,
})

export type Point = Schema.Schema.Type<typeof PointSchema>

export const SizeSchema = Schema.Struct({
  width: Schema.Number,
  height: Schema.Number,
})

export type Size = Schema.Schema.Type<typeof SizeSchema>

/**
 * Axis-aligned rectangle. `x + width` and `y + height` are exclusive edges.
 */
export const RectSchema = Schema.Struct({
  x: Schema.Number,
  y: Schema.Number,
  width: Schema.Number,
  height: Schema.Number,
})

export type Rect = Schema.Schema.Type<typeof RectSchema>

// ============================================================================
// Helpers
// ============================================================================

export const rectRight = (rect: Rect): number => rect.x + rect.width

export const rectBottom = (rect: Rect): number => rect.y + rect.height

export const rectCenter = (rect: Rect): Point => ({
  x: rect.x + Math.floor(rect.width / 2),
  y: rect.y + Math.floor(rect.height / 2),
})

export const containsPoint = (rect: Rect, point: Point): boolean =>
  point.x >= rect.x &&
  point.x < rectRight(rect) &&
  point.y >= rect.y &&
  point.y < rectBottom(rect)

/**
 * True when `inner` lies entirely inside `outer`.
 */
export const containsRect = (outer: Rect, inner: Rect): boolean =>
  inner.x >= outer.x &&
  inner.y >= outer.y &&
  rectRight(inner) <= rectRight(outer) &&
  rectBottom(inner) <= rectBottom(outer)

/**
 * Clamp a leading coordinate so a span of `length` stays within
 * `[min, max)`. The minimum wins when the span is larger than the range.
 */
export const clampSpan = (
  start: number,
  length: number,
  min: number,
  max: number
): number => Math.max(min, Math.min(start, max - length))

/**
 * Move `rect` (keeping its size) so it sits inside `bounds`, each axis
 * clamped independently.
 */
export const clampRectInto = (rect: Rect, bounds: Rect): Rect => ({
  ...rect,
  x: clampSpan(rect.x, rect.width, bounds.x, rectRight(bounds)),
  y: clampSpan(rect.y, rect.height, bounds.y, rectBottom(bounds)),
})
