export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal"] as const

export type LogLevelName = (typeof LOG_LEVELS)[number]

export function isLogLevelName(value: string): value is LogLevelName {
  return LOG_LEVELS.some((level) => level === value)
}
