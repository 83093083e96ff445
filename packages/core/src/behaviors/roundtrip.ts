import { Data } from "effect"
import { flipDirection, type WalkDirection } from "@deskpet/shared"

/**
 * A walk to one monitor edge, back across to the other, then stop.
 */
export interface RoundtripWalk {
  readonly active: boolean
  readonly direction: WalkDirection
  readonly edgeHitsRemaining: number
}

/** First edge, then the opposite edge. */
export const ROUNDTRIP_EDGE_HITS = 2

export const IDLE_ROUNDTRIP: RoundtripWalk = {
  active: false,
  direction: 1,
  edgeHitsRemaining: 0,
}

export const beginRoundtrip = (direction: WalkDirection): RoundtripWalk => ({
  active: true,
  direction,
  edgeHitsRemaining: ROUNDTRIP_EDGE_HITS,
})

export type EdgeOutcome = Data.TaggedEnum<{
  Ignored: { readonly reason: string }
  Reversed: { readonly direction: WalkDirection }
  Completed: { readonly direction: WalkDirection }
}>

export const EdgeOutcome = Data.taggedEnum<EdgeOutcome>()

/**
 * Count one verified edge contact. This is the only place
 * `edgeHitsRemaining` changes.
 */
export const registerEdgeHit = (
  walk: RoundtripWalk
): { readonly walk: RoundtripWalk; readonly outcome: EdgeOutcome } => {
  if (!walk.active) {
    return { walk, outcome: EdgeOutcome.Ignored({ reason: "no roundtrip in progress" }) }
  }

  const edgeHitsRemaining = walk.edgeHitsRemaining - 1
  if (edgeHitsRemaining <= 0) {
    return { walk: IDLE_ROUNDTRIP, outcome: EdgeOutcome.Completed({ direction: walk.direction }) }
  }

  const direction = flipDirection(walk.direction)
  return {
    walk: { active: true, direction, edgeHitsRemaining },
    outcome: EdgeOutcome.Reversed({ direction }),
  }
}
