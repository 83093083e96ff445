// ============================================================================
// Scoped console logging
// ============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent"

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"]

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

export interface Logger {
  debug(message: string, ...details: unknown[]): void
  info(message: string, ...details: unknown[]): void
  warn(message: string, ...details: unknown[]): void
  error(message: string, ...details: unknown[]): void
}

let activeLevel: LogLevel = "info"

export function setLogLevel(level: LogLevel): void {
  activeLevel = level
}

const enabled = (level: LogLevel): boolean => LEVEL_RANK[level] >= LEVEL_RANK[activeLevel]

/**
 * Logger that prefixes every line with `[scope]`, matching the
 * `[Component] message` lines used throughout the project.
 */
export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`
  return {
    debug: (message, ...details) => {
      if (enabled("debug")) console.log(`${prefix} ${message}`, ...details)
    },
    info: (message, ...details) => {
      if (enabled("info")) console.log(`${prefix} ${message}`, ...details)
    },
    warn: (message, ...details) => {
      if (enabled("warn")) console.warn(`${prefix} ${message}`, ...details)
    },
    error: (message, ...details) => {
      if (enabled("error")) console.error(`${prefix} ${message}`, ...details)
    },
  }
}
