import { Data } from "effect"

/**
 * Result of a user-triggered operation that may be refused in the current
 * state. A refusal carries the notice that was shown.
 */
export type Outcome = Data.TaggedEnum<{
  Applied: {}
  Refused: { readonly notice: string }
}>

export const Outcome = Data.taggedEnum<Outcome>()
