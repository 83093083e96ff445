/**
 * Centralized Companion Configuration using Effect Config
 *
 * Behavior timings and paths, overridable through DESKPET_* environment
 * variables and provided as a service.
 */

import { Config, Context, Effect, Layer } from "effect"
import { homedir } from "node:os"
import { join } from "node:path"
import { LOG_LEVELS, type LogLevel } from "../logging/logger"

// ============================================================================
// PetConfig Interface
// ============================================================================

export interface PetConfigData {
  /** Walking speed in pixels per second */
  readonly walkSpeedPxPerSec: number
  /** Walk tick period; larger is cheaper but less smooth */
  readonly walkTickMs: number
  /** Vertical bob amplitude while walking (0 disables) */
  readonly walkBobPx: number
  readonly walkBobPeriodMs: number
  /** Playback speed percentages for the resting and walking animations */
  readonly idlePlaybackSpeed: number
  readonly walkPlaybackSpeed: number
  /** Random chatter delay range */
  readonly chatterMinMs: number
  readonly chatterMaxMs: number
  readonly chatterProbability: number
  readonly autoRoundtripMs: number
  /** How long the rest reminder keeps the pet lying down */
  readonly autoRestPoseMs: number
  readonly pomodoroWorkSec: number
  readonly pomodoroBreakSec: number
  /** Pointer movement (Manhattan length) before a press becomes a drag */
  readonly dragThresholdPx: number
  /** A press released sooner than this counts as a click */
  readonly clickMaxMs: number
  readonly snapMarginPx: number
  readonly greetingDelayMs: number
  readonly onScreenCheckDelayMs: number
  /** Directory holding the pose animations */
  readonly assetsDir: string
  /** JSON file the Node runtime persists settings to */
  readonly settingsFile: string
  readonly logLevel: LogLevel
}

// ============================================================================
// Default Values
// ============================================================================

export const DEFAULT_PET_CONFIG: Omit<PetConfigData, "assetsDir" | "settingsFile"> = {
  walkSpeedPxPerSec: 90,
  walkTickMs: 55,
  walkBobPx: 2,
  walkBobPeriodMs: 420,
  idlePlaybackSpeed: 20,
  walkPlaybackSpeed: 115,
  chatterMinMs: 45_000,
  chatterMaxMs: 140_000,
  chatterProbability: 0.6,
  autoRoundtripMs: 30 * 60 * 1000,
  autoRestPoseMs: 15_000,
  pomodoroWorkSec: 25 * 60,
  pomodoroBreakSec: 5 * 60,
  dragThresholdPx: 6,
  clickMaxMs: 350,
  snapMarginPx: 18,
  greetingDelayMs: 650,
  onScreenCheckDelayMs: 180,
  logLevel: "info",
}

const defaultAssetsDir = (): string => join(process.cwd(), "assets")

const defaultSettingsFile = (): string => join(homedir(), ".deskpet", "settings.json")

/**
 * Defaults with no environment applied.
 */
export function defaultPetConfig(
  overrides: Partial<PetConfigData> = {}
): PetConfigData {
  return {
    ...DEFAULT_PET_CONFIG,
    assetsDir: defaultAssetsDir(),
    settingsFile: defaultSettingsFile(),
    ...overrides,
  }
}

// ============================================================================
// Config Definitions
// ============================================================================

const positiveInt = (name: string, fallback: number) =>
  Config.integer(name).pipe(
    Config.validate({ message: `${name} must be a positive integer`, validation: (n) => n > 0 }),
    Config.withDefault(fallback)
  )

const nonNegativeInt = (name: string, fallback: number) =>
  Config.integer(name).pipe(
    Config.validate({ message: `${name} must not be negative`, validation: (n) => n >= 0 }),
    Config.withDefault(fallback)
  )

/**
 * Effect Config for all behavior settings. Loaded once at startup.
 */
export const PetConfigEffect = Effect.gen(function* () {
  const walkSpeedPxPerSec = yield* Config.number("DESKPET_WALK_SPEED_PX_PER_SEC").pipe(
    Config.validate({ message: "walk speed must be positive", validation: (n) => n > 0 }),
    Config.withDefault(DEFAULT_PET_CONFIG.walkSpeedPxPerSec)
  )
  const walkTickMs = yield* positiveInt("DESKPET_WALK_TICK_MS", DEFAULT_PET_CONFIG.walkTickMs)
  const walkBobPx = yield* nonNegativeInt("DESKPET_WALK_BOB_PX", DEFAULT_PET_CONFIG.walkBobPx)
  const walkBobPeriodMs = yield* positiveInt(
    "DESKPET_WALK_BOB_PERIOD_MS",
    DEFAULT_PET_CONFIG.walkBobPeriodMs
  )

  const chatterMinMs = yield* positiveInt("DESKPET_CHATTER_MIN_MS", DEFAULT_PET_CONFIG.chatterMinMs)
  const chatterMaxRaw = yield* positiveInt("DESKPET_CHATTER_MAX_MS", DEFAULT_PET_CONFIG.chatterMaxMs)

  const autoRoundtripMs = yield* positiveInt(
    "DESKPET_AUTO_ROUNDTRIP_MS",
    DEFAULT_PET_CONFIG.autoRoundtripMs
  )
  const autoRestPoseMs = yield* positiveInt(
    "DESKPET_AUTO_REST_POSE_MS",
    DEFAULT_PET_CONFIG.autoRestPoseMs
  )
  const pomodoroWorkSec = yield* positiveInt(
    "DESKPET_POMODORO_WORK_SEC",
    DEFAULT_PET_CONFIG.pomodoroWorkSec
  )
  const pomodoroBreakSec = yield* positiveInt(
    "DESKPET_POMODORO_BREAK_SEC",
    DEFAULT_PET_CONFIG.pomodoroBreakSec
  )

  const assetsDir = yield* Config.string("DESKPET_ASSETS_DIR").pipe(
    Config.withDefault(defaultAssetsDir())
  )
  const settingsFile = yield* Config.string("DESKPET_SETTINGS_FILE").pipe(
    Config.withDefault(defaultSettingsFile())
  )
  const logLevel = yield* Config.literal(...LOG_LEVELS)("DESKPET_LOG_LEVEL").pipe(
    Config.withDefault(DEFAULT_PET_CONFIG.logLevel)
  )

  return {
    ...DEFAULT_PET_CONFIG,
    walkSpeedPxPerSec,
    walkTickMs,
    walkBobPx,
    walkBobPeriodMs,
    chatterMinMs,
    // An inverted range collapses to its minimum
    chatterMaxMs: Math.max(chatterMinMs, chatterMaxRaw),
    autoRoundtripMs,
    autoRestPoseMs,
    pomodoroWorkSec,
    pomodoroBreakSec,
    assetsDir,
    settingsFile,
    logLevel,
  } satisfies PetConfigData
})

// ============================================================================
// PetConfig Service Tag
// ============================================================================

export class PetConfig extends Context.Tag("PetConfig")<PetConfig, PetConfigData>() {}

// ============================================================================
// Layer
// ============================================================================

/**
 * Live layer that loads configuration from environment variables.
 * Fails if a variable is present but invalid.
 */
export const PetConfigLive = Layer.effect(PetConfig, PetConfigEffect)

// ============================================================================
// Synchronous Config Loader
// ============================================================================

const parseEnvInt = (
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: number,
  min: number
): number => {
  const value = env[key]
  if (!value) return fallback
  const parsed = Number(value)
  return Number.isInteger(parsed) && parsed >= min ? parsed : fallback
}

const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value)

/**
 * Synchronously load configuration for callers outside an Effect context.
 * Invalid values fall back to defaults instead of failing.
 */
export function loadConfigSync(env: NodeJS.ProcessEnv = process.env): PetConfigData {
  const speedRaw = Number(env.DESKPET_WALK_SPEED_PX_PER_SEC)
  const walkSpeedPxPerSec =
    env.DESKPET_WALK_SPEED_PX_PER_SEC && Number.isFinite(speedRaw) && speedRaw > 0
      ? speedRaw
      : DEFAULT_PET_CONFIG.walkSpeedPxPerSec

  const chatterMinMs = parseEnvInt(env, "DESKPET_CHATTER_MIN_MS", DEFAULT_PET_CONFIG.chatterMinMs, 1)
  const chatterMaxMs = Math.max(
    chatterMinMs,
    parseEnvInt(env, "DESKPET_CHATTER_MAX_MS", DEFAULT_PET_CONFIG.chatterMaxMs, 1)
  )

  const logLevelRaw = env.DESKPET_LOG_LEVEL ?? ""

  return defaultPetConfig({
    walkSpeedPxPerSec,
    walkTickMs: parseEnvInt(env, "DESKPET_WALK_TICK_MS", DEFAULT_PET_CONFIG.walkTickMs, 1),
    walkBobPx: parseEnvInt(env, "DESKPET_WALK_BOB_PX", DEFAULT_PET_CONFIG.walkBobPx, 0),
    walkBobPeriodMs: parseEnvInt(env, "DESKPET_WALK_BOB_PERIOD_MS", DEFAULT_PET_CONFIG.walkBobPeriodMs, 1),
    chatterMinMs,
    chatterMaxMs,
    autoRoundtripMs: parseEnvInt(env, "DESKPET_AUTO_ROUNDTRIP_MS", DEFAULT_PET_CONFIG.autoRoundtripMs, 1),
    autoRestPoseMs: parseEnvInt(env, "DESKPET_AUTO_REST_POSE_MS", DEFAULT_PET_CONFIG.autoRestPoseMs, 1),
    pomodoroWorkSec: parseEnvInt(env, "DESKPET_POMODORO_WORK_SEC", DEFAULT_PET_CONFIG.pomodoroWorkSec, 1),
    pomodoroBreakSec: parseEnvInt(env, "DESKPET_POMODORO_BREAK_SEC", DEFAULT_PET_CONFIG.pomodoroBreakSec, 1),
    assetsDir: env.DESKPET_ASSETS_DIR ?? defaultAssetsDir(),
    settingsFile: env.DESKPET_SETTINGS_FILE ?? defaultSettingsFile(),
    logLevel: isLogLevel(logLevelRaw) ? logLevelRaw : DEFAULT_PET_CONFIG.logLevel,
  })
}
