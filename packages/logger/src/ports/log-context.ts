/**
 * Well-known fields carried by boot-time loggers.
 *
 * Adapters accept any extra keys; these are the ones the boot pipeline
 * and the registry bind themselves.
 */
export type LogContext = {
  service: string
  version: string
  eventId: string

  module: string
  entryKind: string
  entryName: string

  env: string
}

export type LogEvent = {
  err: unknown
}

export type LogFields = Partial<LogContext> & Record<string, unknown>

export type LogMeta = LogFields & Partial<LogEvent>
