import { describe, expect, it } from "vitest"
import {
  clampRectInto,
  clampSpan,
  containsPoint,
  containsRect,
  rectBottom,
  rectCenter,
  rectRight,
  type Rect,
} from "../src"

const screen: Rect = { x: 0, y: 0, width: 1920, height: 1040 }

describe("geometry helpers", () => {
  it("computes exclusive edges and the center", () => {
    const rect: Rect = { x: 10, y: 20, width: 101, height: 50 }
    expect(rectRight(rect)).toBe(111)
    expect(rectBottom(rect)).toBe(70)
    expect(rectCenter(rect)).toEqual({ x: 60, y: 45 })
  })

  it("tests point containment with exclusive far edges", () => {
    expect(containsPoint(screen, { x: 0, y: 0 })).toBe(true)
    expect(containsPoint(screen, { x: 1919, y: 1039 })).toBe(true)
    expect(containsPoint(screen, { x: 1920, y: 10 })).toBe(false)
    expect(containsPoint(screen, { x: -1, y: 10 })).toBe(false)
  })

  it("clamps a span into a range", () => {
    expect(clampSpan(-30, 100, 0, 1920)).toBe(0)
    expect(clampSpan(1900, 100, 0, 1920)).toBe(1820)
    expect(clampSpan(500, 100, 0, 1920)).toBe(500)
  })

  it("keeps the minimum when the span is larger than the range", () => {
    expect(clampSpan(50, 300, 0, 200)).toBe(0)
  })

  it("clamps rectangles on both axes independently", () => {
    const clamped = clampRectInto({ x: 1900, y: -40, width: 200, height: 100 }, screen)
    expect(clamped).toEqual({ x: 1720, y: 0, width: 200, height: 100 })
    expect(containsRect(screen, clamped)).toBe(true)
  })

  it("clamps into a secondary monitor with a negative origin", () => {
    const left: Rect = { x: -1280, y: 0, width: 1280, height: 1024 }
    const clamped = clampRectInto({ x: -1300, y: 1000, width: 128, height: 128 }, left)
    expect(clamped).toEqual({ x: -1280, y: 896, width: 128, height: 128 })
  })
})
