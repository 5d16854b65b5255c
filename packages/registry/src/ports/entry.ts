import type { Logger } from "@keel/logger"

export type EntryContext = {
  /** Aborted when the process starts shutting down. */
  signal: AbortSignal
  logger: Logger
}

/**
 * A named, typed component with a bootstrap/interrupt lifecycle.
 *
 * `(kind(), name())` identifies an entry inside a Registry. An entry that
 * cannot initialize its resources throws from `bootstrap`.
 */
export interface Entry {
  bootstrap(ctx: EntryContext): void | Promise<void>
  interrupt(ctx: EntryContext): void | Promise<void>
  name(): string
  kind(): string
  describe(): string
  /** The entry served when a lookup by name misses. At most one per kind. */
  isDefault?(): boolean
}
