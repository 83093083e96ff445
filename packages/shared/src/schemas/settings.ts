import { Option, ParseResult, Schema } from "effect"
import type { Point } from "./geometry"

// ============================================================================
// Persisted Settings
// ============================================================================

/**
 * Everything the companion persists between runs. Keys match the stored
 * names so a settings file stays readable.
 */
export interface PetSettings {
  readonly locked: boolean
  readonly chatter_enabled: boolean
  readonly rest_enabled: boolean
  readonly rest_interval_minutes: number
  readonly scale: number
  readonly auto_roundtrip_enabled: boolean
  readonly position: Point
}

export type SettingKey = keyof PetSettings

export const SETTING_DEFAULTS: PetSettings = {
  locked: false,
  chatter_enabled: true,
  rest_enabled: true,
  rest_interval_minutes: 50,
  scale: 1.0,
  auto_roundtrip_enabled: true,
  position: { x: 80, y: 80 },
}

export const SETTING_KEYS = [
  "locked",
  "chatter_enabled",
  "rest_enabled",
  "rest_interval_minutes",
  "scale",
  "auto_roundtrip_enabled",
  "position",
] as const satisfies ReadonlyArray<SettingKey>

/**
 * Preset sizes offered by the size menu.
 */
export const SCALE_PRESETS = [0.5, 0.75, 1, 1.25] as const

export type ScalePreset = (typeof SCALE_PRESETS)[number]

export const ScalePresetSchema = Schema.Literal(...SCALE_PRESETS)

export const MIN_SCALE = 0.3
export const MAX_SCALE = 2.0

// ============================================================================
// Coercion Schemas
// ============================================================================

const TRUTHY_TEXT = new Set(["1", "true", "yes", "y", "on"])
const FALSY_TEXT = new Set(["0", "false", "no", "n", "off", ""])

/**
 * Booleans arrive from hand-edited files and older stores as text.
 */
const BooleanFromText = Schema.transformOrFail(Schema.String, Schema.Boolean, {
  strict: true,
  decode: (text, _options, ast) => {
    const normalized = text.trim().toLowerCase()
    if (TRUTHY_TEXT.has(normalized)) return ParseResult.succeed(true)
    if (FALSY_TEXT.has(normalized)) return ParseResult.succeed(false)
    return ParseResult.fail(new ParseResult.Type(ast, text, `Not a boolean: "${text}"`))
  },
  encode: (value) => ParseResult.succeed(value ? "true" : "false"),
})

export const LenientBooleanSchema = Schema.Union(Schema.Boolean, BooleanFromText)

export const LenientNumberSchema = Schema.Union(
  Schema.Number,
  Schema.NumberFromString
).pipe(Schema.finite())

export const RestIntervalMinutesSchema = LenientNumberSchema.pipe(
  Schema.int(),
  Schema.positive()
)

export const ScaleSchema = LenientNumberSchema.pipe(Schema.positive())

export const StoredPositionSchema = Schema.Struct({
  x: LenientNumberSchema.pipe(Schema.int()),
  y: LenientNumberSchema.pipe(Schema.int()),
})

type SettingDecoders = {
  readonly [K in SettingKey]: (raw: unknown) => Option.Option<PetSettings[K]>
}

const SETTING_DECODERS: SettingDecoders = {
  locked: Schema.decodeUnknownOption(LenientBooleanSchema),
  chatter_enabled: Schema.decodeUnknownOption(LenientBooleanSchema),
  rest_enabled: Schema.decodeUnknownOption(LenientBooleanSchema),
  rest_interval_minutes: Schema.decodeUnknownOption(RestIntervalMinutesSchema),
  scale: Schema.decodeUnknownOption(ScaleSchema),
  auto_roundtrip_enabled: Schema.decodeUnknownOption(LenientBooleanSchema),
  position: Schema.decodeUnknownOption(StoredPositionSchema),
}

/**
 * Decode a raw stored value for `key`. Anything that does not parse as the
 * key's type yields the documented default; this never throws.
 */
export const coerceSetting = <K extends SettingKey>(
  key: K,
  raw: unknown
): PetSettings[K] =>
  Option.getOrElse(SETTING_DECODERS[key](raw), () => SETTING_DEFAULTS[key])

/**
 * Decode a whole stored record, key by key.
 */
export const coerceSettings = (raw: Readonly<Record<string, unknown>>): PetSettings => ({
  locked: coerceSetting("locked", raw.locked),
  chatter_enabled: coerceSetting("chatter_enabled", raw.chatter_enabled),
  rest_enabled: coerceSetting("rest_enabled", raw.rest_enabled),
  rest_interval_minutes: coerceSetting("rest_interval_minutes", raw.rest_interval_minutes),
  scale: coerceSetting("scale", raw.scale),
  auto_roundtrip_enabled: coerceSetting("auto_roundtrip_enabled", raw.auto_roundtrip_enabled),
  position: coerceSetting("position", raw.position),
})

const settingKeySet = new Set<string>(SETTING_KEYS)

export const isSettingKey = (value: string): value is SettingKey =>
  settingKeySet.has(value)
