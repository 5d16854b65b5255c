import type { MapNode } from "@keel/config"
import type { Logger } from "@keel/logger"
import type { Entry, Registry } from "@keel/registry"
import type { LocaleEnv } from "./locale-env"

export type FactoryContext = {
  registry: Registry
  logger: Logger
  locale: LocaleEnv
  /** Base directory for relative paths found in the boot document. */
  cwd: string
}

/**
 * Builds entries from the resolved boot document. Factories decode their
 * own section; the bootstrapper registers and bootstraps what they return.
 */
export type EntryFactory = (
  document: MapNode,
  ctx: FactoryContext,
) => Entry[] | Promise<Entry[]>
