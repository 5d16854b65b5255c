import type { LogFields, LogMeta } from "./log-context"

export interface Logger {
  trace(message: string, meta?: LogMeta): void
  debug(message: string, meta?: LogMeta): void
  info(message: string, meta?: LogMeta): void
  warn(message: string, meta?: LogMeta): void
  error(message: string, meta?: LogMeta): void
  fatal(message: string, meta?: LogMeta): void

  /**
   * Returns a logger whose entries carry `context` in addition to the
   * parent's. Keys in `context` win over the parent's on conflict.
   */
  child(context: LogFields): Logger
}
