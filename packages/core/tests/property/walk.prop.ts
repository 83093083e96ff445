import * as fc from "fast-check"
import { describe, expect, it } from "vitest"
import { containsRect, type Rect, type WalkDirection } from "@deskpet/shared"
import { PetWindow, StaticScreenGeometry, VirtualTimeDriver, WalkController } from "../../src"
import { MONITOR, RecordingWindowSurface } from "../helpers"

const directionArb = fc.constantFrom<WalkDirection>(-1, 1)

function walker(monitor: Rect, x: number, y: number, speedPxPerSec: number, tickMs: number) {
  const driver = new VirtualTimeDriver()
  const window = new PetWindow(new StaticScreenGeometry([monitor]), new RecordingWindowSurface(), {
    x,
    y,
    width: 100,
    height: 80,
  })
  const walk = new WalkController({
    window,
    clock: driver.clock,
    queue: driver.queue,
    settings: { speedPxPerSec, tickMs, bobPx: 2, bobPeriodMs: 420 },
    isDragging: () => false,
    onEdge: () => {},
  })
  return { driver, window, walk }
}

describe("walk kinematics", () => {
  it("never leaves the monitor, whatever the start and duration", () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 0, max: 900 }),
        fc.integer({ min: 0, max: 720 }),
        directionArb,
        fc.integer({ min: 1, max: 400 }),
        (x, y, direction, ticks) => {
          const { driver, window, walk } = walker(MONITOR, x, y, 90, 55)
          const escaped: Rect[] = []
          window.onMoved(() => {
            if (!containsRect(MONITOR, window.bounds)) escaped.push(window.bounds)
          })

          walk.start(direction)
          driver.advanceBy(ticks * 55)
          expect(escaped).toEqual([])
        }
      )
    )
  })

  it("travels within one pixel of speed times time", () => {
    const wide: Rect = { x: 0, y: 0, width: 100_000, height: 800 }
    fc.assert(
      fc.property(
        fc.integer({ min: 1, max: 500 }),
        fc.integer({ min: 10, max: 100 }),
        fc.integer({ min: 1, max: 300 }),
        (speed, tickMs, ticks) => {
          const { driver, walk } = walker(wide, 50_000, 300, speed, tickMs)
          walk.start(1)
          driver.advanceBy(ticks * tickMs)

          const ideal = ticks * speed * (tickMs / 1000)
          const shortfall = ideal - walk.distanceTravelled
          expect(shortfall).toBeGreaterThan(-1e-6)
          expect(shortfall).toBeLessThan(1 + 1e-6)
        }
      )
    )
  })
})
