import { describe, expect, it } from "vitest"
import {
  AUTO_ROUNDTRIP_KEY,
  CHATTER_KEY,
  ENCOURAGE_LINES,
  IDLE_ROUNDTRIP,
  Outcome,
  REST_PERIODIC_KEY,
  REST_POSE_BACK_KEY,
  REST_SNOOZE_KEY,
} from "../src"
import { ScriptedRandom, buildPet } from "./helpers"

const WIDE_MONITOR = { x: 0, y: 0, width: 20_000, height: 800 }

describe("roundtrip walk", () => {
  it("walks to one edge, turns, walks to the other and sits", () => {
    const { pet, driver, bubbleTitles } = buildPet()

    expect(pet.walkRoundtrip(1)).toEqual(Outcome.Applied())
    expect(pet.stateMachine.pose).toBe("walkingRight")
    expect(pet.scheduler.roundtripState).toEqual({ active: true, direction: 1, edgeHitsRemaining: 2 })

    // 90 px/s in 55 ms ticks reaches x=900 on the tick at 9130 ms
    driver.advanceBy(9000)
    expect(pet.stateMachine.pose).toBe("walkingRight")
    expect(pet.scheduler.roundtripState.edgeHitsRemaining).toBe(2)

    driver.advanceBy(200)
    expect(pet.stateMachine.pose).toBe("walkingLeft")
    expect(pet.scheduler.roundtripState).toEqual({ active: true, direction: -1, edgeHitsRemaining: 1 })

    driver.advanceBy(15_000)
    expect(pet.stateMachine.pose).toBe("sitting")
    expect(pet.scheduler.roundtripState).toEqual(IDLE_ROUNDTRIP)
    expect(pet.window.position).toEqual({ x: 0, y: 80 })
    expect(bubbleTitles).toEqual(["Walk", "Hello", "Walk finished"])
  })

  it("announces the start of a manual walk", () => {
    const { pet, shown } = buildPet()

    pet.walkRoundtrip(-1)
    expect(shown).toEqual([
      { title: "Walk", message: "I'm going all the way to the side", durationMs: 2600 },
    ])
  })

  it("is cancelled when the pose leaves walking", () => {
    const { pet } = buildPet()
    pet.walkRoundtrip(1)

    pet.sit()
    expect(pet.scheduler.roundtripState.active).toBe(false)
  })

  it("refuses while dragging", () => {
    const { pet, bubbleTitles } = buildPet()
    pet.pointerDown("left", { x: 120, y: 100 })

    expect(pet.walkRoundtrip()).toEqual(Outcome.Refused({ notice: "Put me down first." }))
    expect(bubbleTitles).toEqual(["Walk"])
  })

  it("refuses while lying down", () => {
    const { pet } = buildPet()
    pet.lieDown()

    expect(pet.walkRoundtrip()).toEqual(Outcome.Refused({ notice: "I'm resting right now." }))
    expect(pet.stateMachine.pose).toBe("lyingDown")
  })

  it("refuses during a pomodoro", () => {
    const { pet } = buildPet()
    pet.pomodoro.start()

    expect(pet.walkRoundtrip()).toEqual(Outcome.Refused({ notice: "Not during a pomodoro." }))
  })

  it("refuses when already walking", () => {
    const { pet } = buildPet()
    pet.stateMachine.setState("walkingRight")

    expect(pet.walkRoundtrip(-1)).toEqual(Outcome.Refused({ notice: "Already walking." }))
    expect(pet.stateMachine.pose).toBe("walkingRight")
  })
})

describe("auto roundtrip", () => {
  const autoOn = { settings: { auto_roundtrip_enabled: true }, config: { autoRoundtripMs: 60_000 } }

  it("starts a walk after sitting a while", () => {
    const { pet, driver, bubbleTitles } = buildPet(autoOn)

    driver.advanceBy(60_000)
    expect(pet.stateMachine.pose).toBe("walkingRight")
    expect(pet.scheduler.roundtripState.active).toBe(true)
    expect(bubbleTitles).toEqual(["Hello", "Auto walk"])
  })

  it("does nothing while dragging", () => {
    const { pet, driver, bubbleTitles } = buildPet(autoOn)
    pet.pointerDown("left", { x: 120, y: 100 })

    driver.advanceBy(60_000)
    expect(pet.stateMachine.pose).toBe("sitting")
    expect(bubbleTitles).toEqual(["Hello"])
    expect(driver.queue.isActive(AUTO_ROUNDTRIP_KEY)).toBe(true)
  })

  it("does nothing during a pomodoro", () => {
    const { pet, driver, bubbleTitles } = buildPet(autoOn)
    pet.pomodoro.start()

    driver.advanceBy(60_000)
    expect(pet.stateMachine.pose).toBe("sitting")
    expect(bubbleTitles).not.toContain("Auto walk")
  })

  it("does nothing unless sitting", () => {
    const { pet, driver } = buildPet(autoOn)
    pet.lieDown()

    driver.advanceBy(60_000)
    expect(pet.stateMachine.pose).toBe("lyingDown")
    expect(pet.scheduler.roundtripState.active).toBe(false)
  })
})

describe("rest reminder", () => {
  const restEveryMinute = { rest_enabled: true, rest_interval_minutes: 1 }

  it("preempts a roundtrip and lies down for a while", () => {
    const { pet, driver, shown } = buildPet({
      settings: restEveryMinute,
      monitors: [WIDE_MONITOR],
    })
    pet.walkRoundtrip(1)

    driver.advanceBy(60_000)
    expect(pet.stateMachine.pose).toBe("lyingDown")
    expect(pet.scheduler.roundtripState.active).toBe(false)
    expect(pet.walk.isWalking).toBe(false)
    expect(pet.window.position.y).toBe(80)
    expect(shown[shown.length - 1]?.title).toBe("Rest time")
    expect(pet.bubble.frame?.buttons).toEqual(["Snooze 10 min", "✕"])

    driver.advanceBy(15_000)
    expect(pet.stateMachine.pose).toBe("sitting")
  })

  it("keeps the rest bubble until it is dismissed", () => {
    const { pet, driver } = buildPet({ settings: restEveryMinute })

    driver.advanceBy(60_000 + 50_000)
    expect(pet.bubble.frame?.title).toBe("Rest time")
  })

  it("leaves the pose alone when a pomodoro break owns it", () => {
    const { pet, driver } = buildPet({ settings: restEveryMinute })
    pet.pomodoro.start()
    pet.pomodoro.forceBreak()

    driver.advanceBy(75_000)
    expect(pet.stateMachine.pose).toBe("lyingDown")
    expect(driver.queue.isActive(REST_POSE_BACK_KEY)).toBe(false)
  })

  it("does not sit up if the pose already moved on", () => {
    const { pet, driver } = buildPet({ settings: restEveryMinute, monitors: [WIDE_MONITOR] })

    driver.advanceBy(60_000)
    pet.stateMachine.setState("walkingRight")
    driver.advanceBy(15_000)
    expect(pet.stateMachine.pose).toBe("walkingRight")
  })

  it("snoozes from the bubble and resumes afterwards", () => {
    const { pet, driver, bubbleTitles } = buildPet({ settings: restEveryMinute })
    driver.advanceBy(60_000)

    expect(pet.bubble.pressButton("Snooze 10 min")).toBe(true)
    expect(bubbleTitles[bubbleTitles.length - 1]).toBe("Snoozed")
    expect(driver.queue.isActive(REST_PERIODIC_KEY)).toBe(false)
    expect(driver.queue.remaining(REST_SNOOZE_KEY)).toBe(600_000)

    driver.advanceBy(600_000)
    expect(driver.queue.isActive(REST_SNOOZE_KEY)).toBe(false)
    expect(driver.queue.remaining(REST_PERIODIC_KEY)).toBe(60_000)
  })

  it("does not resume after a snooze once disabled", () => {
    const { pet, driver } = buildPet({ settings: restEveryMinute })
    pet.scheduler.snoozeRest(10)
    pet.scheduler.toggleRest()

    driver.advanceBy(600_000)
    expect(driver.queue.isActive(REST_PERIODIC_KEY)).toBe(false)
    expect(pet.stateMachine.pose).toBe("sitting")
  })

  it("refuses a snooze of zero minutes without a bubble", () => {
    const { pet, driver, bubbleTitles } = buildPet({ settings: restEveryMinute })

    expect(pet.scheduler.snoozeRest(0)).toEqual(
      Outcome.Refused({ notice: "Snooze needs a positive number of minutes." })
    )
    expect(bubbleTitles).toEqual([])
    expect(driver.queue.remaining(REST_PERIODIC_KEY)).toBe(60_000)
  })
})

describe("chatter", () => {
  it("never speaks or re-arms while disabled", () => {
    const { pet, driver, bubbleTitles } = buildPet()

    for (let i = 0; i < 100; i++) pet.scheduler.runChatter()
    expect(bubbleTitles).toEqual([])
    expect(driver.queue.isActive(CHATTER_KEY)).toBe(false)
  })

  it("speaks when the roll passes and re-arms within the range", () => {
    const { driver, shown } = buildPet({
      settings: { chatter_enabled: true },
      rng: new ScriptedRandom([0, 0.1, 0, 0.5]),
    })
    expect(driver.queue.remaining(CHATTER_KEY)).toBe(45_000)

    driver.advanceBy(45_000)
    expect(shown.map((s) => s.title)).toEqual(["Hello", "Keep going"])
    expect(shown[1]?.message).toBe(ENCOURAGE_LINES[0])
    expect(driver.queue.remaining(CHATTER_KEY)).toBe(92_500)
  })

  it("stays quiet when the roll fails but still re-arms", () => {
    const { driver, bubbleTitles } = buildPet({
      settings: { chatter_enabled: true },
      rng: new ScriptedRandom([0, 0.7]),
    })

    driver.advanceBy(45_000)
    expect(bubbleTitles).toEqual(["Hello"])
    expect(driver.queue.remaining(CHATTER_KEY)).toBe(139_050)
  })

  it("stays quiet while hidden", () => {
    const { pet, driver, bubbleTitles } = buildPet({
      settings: { chatter_enabled: true },
      rng: new ScriptedRandom([0, 0.1]),
    })
    pet.hideAll()

    driver.advanceBy(45_000)
    expect(bubbleTitles).toEqual(["Hello"])
    expect(driver.queue.isActive(CHATTER_KEY)).toBe(true)
  })
})

describe("toggles", () => {
  it("persists each flag and re-arms its timer", () => {
    const { pet, driver, settings, shown } = buildPet()

    expect(pet.scheduler.toggleRest()).toBe(true)
    expect(settings.get("rest_enabled")).toBe(true)
    expect(driver.queue.remaining(REST_PERIODIC_KEY)).toBe(50 * 60_000)
    expect(shown[shown.length - 1]).toEqual({
      title: "Rest reminder",
      message: "ON ✅",
      durationMs: 2200,
    })

    expect(pet.scheduler.toggleChatter()).toBe(true)
    expect(settings.get("chatter_enabled")).toBe(true)
    expect(driver.queue.isActive(CHATTER_KEY)).toBe(true)

    expect(pet.scheduler.toggleAutoRoundtrip()).toBe(true)
    expect(settings.get("auto_roundtrip_enabled")).toBe(true)
    expect(driver.queue.remaining(AUTO_ROUNDTRIP_KEY)).toBe(30 * 60_000)

    expect(pet.scheduler.toggleRest()).toBe(false)
    expect(driver.queue.isActive(REST_PERIODIC_KEY)).toBe(false)
    expect(shown[shown.length - 1]?.message).toBe("OFF ❎")
  })

  it("changes the rest interval", () => {
    const { pet, driver, settings } = buildPet({ settings: { rest_enabled: true } })

    expect(pet.scheduler.setRestInterval(5)).toEqual(Outcome.Applied())
    expect(settings.get("rest_interval_minutes")).toBe(5)
    expect(driver.queue.remaining(REST_PERIODIC_KEY)).toBe(300_000)
  })

  it("rejects a rest interval that is not a positive whole number", () => {
    const { pet, settings } = buildPet()
    const refused = Outcome.Refused({ notice: "Rest interval must be a whole number of minutes." })

    expect(pet.scheduler.setRestInterval(0)).toEqual(refused)
    expect(pet.scheduler.setRestInterval(2.5)).toEqual(refused)
    expect(settings.get("rest_interval_minutes")).toBe(50)
  })
})
