import { Data } from "effect"
import type { PoseState } from "./pose"
import type { SettingKey } from "./settings"

// ============================================================================
// Companion Errors (Tagged Error Types for Effect)
// ============================================================================

/**
 * A required pose animation is not on disk. Fatal at startup.
 */
export class MissingAssetError extends Data.TaggedError("MissingAssetError")<{
  readonly pose: PoseState
  readonly path: string
}> {}

/**
 * A command payload could not be decoded.
 */
export class InvalidCommandError extends Data.TaggedError("InvalidCommandError")<{
  readonly reason: string
}> {}

/**
 * Writing a setting to durable storage failed.
 */
export class SettingsPersistError extends Data.TaggedError("SettingsPersistError")<{
  readonly key: SettingKey | "*"
  readonly reason: string
}> {}
