import { Option, Schema } from "effect"
import { InvalidCommandError, MissingAssetError, SettingsPersistError } from "@deskpet/shared"

const decodeTag = Schema.decodeUnknownOption(Schema.Struct({ _tag: Schema.String }))
const decodeReason = Schema.decodeUnknownOption(Schema.Struct({ reason: Schema.String }))

/** The `_tag` of an Effect tagged error, or "unknown", for log lines. */
export const extractErrorTag = (error: unknown): string =>
  Option.match(decodeTag(error), {
    onNone: () => "unknown",
    onSome: ({ _tag }) => _tag,
  })

/**
 * Human-readable description of a companion error.
 *
 * Data.TaggedError leaves `.message` empty; the useful details are in the
 * tag-specific fields.
 */
export function describeError(error: unknown): string {
  if (error == null) return "Unknown error"

  if (error instanceof MissingAssetError) {
    return `Missing animation for '${error.pose}': ${error.path}`
  }
  if (error instanceof InvalidCommandError) {
    return `Invalid command: ${error.reason}`
  }
  if (error instanceof SettingsPersistError) {
    return `Could not save setting '${error.key}': ${error.reason}`
  }
  if (error instanceof Error && error.message !== "" && error.message !== "An error has occurred") {
    return error.message
  }

  const reason = decodeReason(error)
  if (Option.isSome(reason) && reason.value.reason !== "") return reason.value.reason

  const str = String(error)
  return str === "[object Object]" ? "Unknown error" : str
}
