import type { WalkDirection } from "@deskpet/shared"

/**
 * Uniform source in [0, 1). Injected wherever behavior is randomized so
 * tests can pin the rolls.
 */
export interface RandomSource {
  next(): number
}

export const mathRandom: RandomSource = {
  next: () => Math.random(),
}

/** Inclusive integer in [min, max]. */
export function randomInt(rng: RandomSource, min: number, max: number): number {
  const low = Math.ceil(Math.min(min, max))
  const high = Math.floor(Math.max(min, max))
  return low + Math.floor(rng.next() * (high - low + 1))
}

export function pickOne<T>(rng: RandomSource, items: readonly T[]): T {
  const index = Math.min(items.length - 1, Math.floor(rng.next() * items.length))
  const item = items[index]
  if (item === undefined) {
    throw new Error("pickOne needs at least one item")
  }
  return item
}

export function randomDirection(rng: RandomSource): WalkDirection {
  return rng.next() < 0.5 ? -1 : 1
}
