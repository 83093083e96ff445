import * as fc from "fast-check"
import { describe, expect, it } from "vitest"
import { VirtualTimeDriver } from "../../src"

describe("TimerQueue ordering", () => {
  it("fires one-shot timers by fire time, ties in scheduling order", () => {
    fc.assert(
      fc.property(fc.array(fc.nat({ max: 1000 }), { maxLength: 40 }), (delays) => {
        const driver = new VirtualTimeDriver()
        const fired: number[] = []
        delays.forEach((delay, index) => {
          driver.queue.schedule(`t${index}`, delay, () => fired.push(index))
        })

        driver.advanceBy(1001)

        const expected = delays
          .map((delay, index) => ({ delay, index }))
          .sort((a, b) => a.delay - b.delay || a.index - b.index)
          .map(({ index }) => index)
        expect(fired).toEqual(expected)
      })
    )
  })
})
