import { describe, expect, it } from "vitest"
import { TimerQueue, VirtualClock, VirtualTimeDriver } from "../src"

describe("TimerQueue", () => {
  it("runs a one-shot timer once at its fire time", () => {
    const driver = new VirtualTimeDriver()
    let calls = 0
    driver.queue.schedule("once", 100, () => calls++)

    driver.advanceBy(99)
    expect(calls).toBe(0)
    driver.advanceBy(1)
    expect(calls).toBe(1)
    driver.advanceBy(1000)
    expect(calls).toBe(1)
    expect(driver.queue.isActive("once")).toBe(false)
  })

  it("repeats an interval timer, first after one interval", () => {
    const driver = new VirtualTimeDriver()
    const firedAt: number[] = []
    driver.queue.every("tick", 50, () => firedAt.push(driver.now()))

    driver.advanceBy(175)
    expect(firedAt).toEqual([50, 100, 150])
    expect(driver.queue.remaining("tick")).toBe(25)
  })

  it("merges missed interval fires into one after the clock jumps", () => {
    const clock = new VirtualClock()
    const queue = new TimerQueue(clock)
    let ticks = 0
    queue.every("tick", 55, () => ticks++)

    clock.set(3_600_000)
    expect(queue.runDue()).toBe(1)
    expect(ticks).toBe(1)
    expect(queue.nextFireAt()).toBe(3_600_025)
    expect(queue.remaining("tick")).toBe(25)
  })

  it("replaces a timer scheduled under an existing key", () => {
    const driver = new VirtualTimeDriver()
    const fired: string[] = []
    driver.queue.schedule("k", 100, () => fired.push("first"))
    driver.queue.schedule("k", 200, () => fired.push("second"))

    driver.advanceBy(300)
    expect(fired).toEqual(["second"])
  })

  it("never runs a cancelled timer", () => {
    const driver = new VirtualTimeDriver()
    let calls = 0
    driver.queue.schedule("k", 10, () => calls++)

    expect(driver.queue.cancel("k")).toBe(true)
    expect(driver.queue.cancel("k")).toBe(false)
    driver.advanceBy(100)
    expect(calls).toBe(0)
  })

  it("runs timers due at the same instant in scheduling order", () => {
    const driver = new VirtualTimeDriver()
    const fired: string[] = []
    driver.queue.schedule("b", 10, () => fired.push("b"))
    driver.queue.schedule("a", 10, () => fired.push("a"))
    driver.queue.schedule("c", 5, () => fired.push("c"))

    driver.advanceBy(10)
    expect(fired).toEqual(["c", "b", "a"])
  })

  it("lets a recurring callback cancel its own timer", () => {
    const driver = new VirtualTimeDriver()
    let count = 0
    driver.queue.every("self", 10, () => {
      count++
      if (count === 2) driver.queue.cancel("self")
    })

    driver.advanceBy(100)
    expect(count).toBe(2)
    expect(driver.queue.isActive("self")).toBe(false)
  })

  it("runs timers scheduled by a callback within the same advance", () => {
    const driver = new VirtualTimeDriver()
    const firedAt: number[] = []
    driver.queue.schedule("outer", 10, () => {
      driver.queue.schedule("inner", 5, () => firedAt.push(driver.now()))
    })

    driver.advanceBy(20)
    expect(firedAt).toEqual([15])
    expect(driver.now()).toBe(20)
  })

  it("reports remaining time and the next fire time", () => {
    const driver = new VirtualTimeDriver()
    driver.queue.schedule("a", 10, () => {})
    driver.queue.schedule("b", 100, () => {})
    driver.queue.cancel("a")

    expect(driver.queue.nextFireAt()).toBe(100)
    driver.advanceBy(30)
    expect(driver.queue.remaining("b")).toBe(70)
    expect(driver.queue.remaining("a")).toBeNull()
    expect(driver.queue.activeKeys()).toEqual(["b"])
  })

  it("notifies subscribers when the schedule changes", () => {
    const queue = new TimerQueue(new VirtualClock())
    let changes = 0
    const unsubscribe = queue.subscribe(() => changes++)

    queue.schedule("a", 10, () => {})
    queue.cancel("a")
    expect(changes).toBe(2)

    unsubscribe()
    queue.schedule("b", 10, () => {})
    expect(changes).toBe(2)
  })

  it("drops everything on clear", () => {
    const driver = new VirtualTimeDriver()
    let calls = 0
    driver.queue.schedule("a", 10, () => calls++)
    driver.queue.every("b", 10, () => calls++)

    driver.queue.clear()
    driver.advanceBy(100)
    expect(calls).toBe(0)
    expect(driver.queue.nextFireAt()).toBeNull()
  })
})

describe("VirtualClock", () => {
  it("refuses to move backwards", () => {
    const clock = new VirtualClock(100)
    expect(() => clock.set(50)).toThrow("cannot move backwards")
    clock.set(150)
    expect(clock.now()).toBe(150)
  })
})
