import { Effect, Either } from "effect"
import { describe, expect, it } from "vitest"
import { POSE_STATES, type Size } from "@deskpet/shared"
import {
  loadAnimationSet,
  resolveAssetPaths,
  uniformBaseSize,
} from "../src"
import { ASSETS_DIR, FakeLoader, buildPet } from "./helpers"

const paths = resolveAssetPaths(ASSETS_DIR)
const speeds = { idle: 20, walk: 115 }

describe("uniformBaseSize", () => {
  it("takes the largest width and height independently", () => {
    expect(
      uniformBaseSize([
        { width: 100, height: 80 },
        { width: 120, height: 60 },
        null,
      ])
    ).toEqual({ width: 120, height: 80 })
  })

  it("is unknown until some frame has a size", () => {
    expect(uniformBaseSize([null, { width: 0, height: 10 }])).toBeNull()
  })
})

describe("loadAnimationSet", () => {
  it("fails on the first missing pose without opening anything", () => {
    const loader = new FakeLoader(new Set([paths.walkingLeft, paths.walkingRight]))

    const result = Effect.runSync(Effect.either(loadAnimationSet(loader, paths, speeds)))
    expect(Either.isLeft(result)).toBe(true)
    if (Either.isLeft(result)) {
      expect(result.left.pose).toBe("walkingLeft")
      expect(result.left.path).toBe(paths.walkingLeft)
    }
    expect(loader.opened.size).toBe(0)
  })

  it("pushes a rendered size to every pose only when it changes", () => {
    const loader = new FakeLoader()
    const set = Effect.runSync(loadAnimationSet(loader, paths, speeds))

    expect(set.applyRenderedSize({ width: 50, height: 40 })).toBe(true)
    expect(set.applyRenderedSize({ width: 50, height: 40 })).toBe(false)
    for (const pose of POSE_STATES) {
      expect(loader.opened.get(paths[pose])?.rendered).toEqual({ width: 50, height: 40 })
    }
  })
})

describe("window sizing", () => {
  it("uses the largest frame of any pose for every pose", () => {
    const sizes = new Map<string, Size | null>([[paths.lyingDown, { width: 140, height: 60 }]])
    const { pet } = buildPet({ loader: new FakeLoader(new Set(), sizes) })

    expect(pet.window.size).toEqual({ width: 140, height: 80 })
    pet.lieDown()
    expect(pet.window.size).toEqual({ width: 140, height: 80 })
  })

  it("ignores scaling until any frame size is known", () => {
    const sizes = new Map<string, Size | null>(POSE_STATES.map((pose) => [paths[pose], null] as const))
    const { pet, settings } = buildPet({ loader: new FakeLoader(new Set(), sizes) })

    pet.wheel(1)
    pet.setScale(0.5)
    expect(pet.window.size).toEqual({ width: 0, height: 0 })
    expect(settings.get("scale")).toBe(1)
  })

  it("restores a saved scale at startup", () => {
    const { pet } = buildPet({ settings: { scale: 0.75 } })

    expect(pet.window.size).toEqual({ width: 75, height: 60 })
  })
})
