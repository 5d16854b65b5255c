import { type Logger, NullLogger } from "@keel/logger"
import type { z } from "zod"
import { ProcessEnvSource } from "../adapters/env/process-env-source"
import type { MapNode } from "../ports/node"
import type { DocumentSource, EnvSource } from "../ports/source"
import { BootConfig } from "./boot-config"
import { decodeConfig } from "./decode"
import { parseEnvOverrides } from "./env-overrides"
import { DocumentError } from "./errors"
import { readFlagOverrides } from "./flag-overrides"
import { mergeNode } from "./merge"
import { lowerMapKeys, mapNode, toNode } from "./node"
import { parseOverrides } from "./parse-overrides"

export const DEFAULT_ENV_PREFIX = "KEEL"
export const DEFAULT_FLAG_NAME = "rkset"

export type ResolveDocumentOptions = {
  document: DocumentSource
  /** Read in order, later sources win. @default [new ProcessEnvSource()] */
  env?: EnvSource[]
  /** @default process.argv.slice(2) */
  argv?: readonly string[]
  /** @default "KEEL" */
  envPrefix?: string
  /** @default "rkset" */
  flagName?: string
  logger?: Logger
}

export type ResolvedDocument = {
  /** Merged document with every key lower-cased. */
  document: MapNode
  documentName: string
  provenance: Map<string, string>
  ignored: string[]
}

export type LoadBootConfigOptions<T> = ResolveDocumentOptions & {
  schema: z.ZodType<T>
}

/**
 * Load the boot document and apply env overrides, then flag overrides.
 *
 * Malformed env variables are skipped. A malformed flag string throws
 * OverrideSyntaxError.
 */
export async function resolveBootDocument(opts: ResolveDocumentOptions): Promise<ResolvedDocument> {
  const logger = (opts.logger ?? new NullLogger()).child({ module: "config" })
  const prefix = opts.envPrefix ?? DEFAULT_ENV_PREFIX
  const flagName = opts.flagName ?? DEFAULT_FLAG_NAME

  const document = await loadDocument(opts.document)
  const provenance = new Map<string, string>()
  const ignored: string[] = []

  const env: Record<string, string | undefined> = {}
  for (const source of opts.env ?? [new ProcessEnvSource()]) {
    for (const [key, value] of Object.entries(await source.load())) {
      if (value !== undefined) env[key] = value
    }
  }

  const envOverrides = parseEnvOverrides(env, prefix, logger)
  const envReport = mergeNode(document, envOverrides.node)
  for (const path of envReport.applied) {
    const origin = envOverrides.applied.find((o) => coversPath(o.path, path))
    provenance.set(path, `env:${origin?.variable ?? prefix}`)
  }
  ignored.push(...envReport.ignored)

  const flags = readFlagOverrides(opts.argv ?? process.argv.slice(2), flagName)
  if (flags !== "") {
    const flagReport = mergeNode(document, lowerMapKeys(parseOverrides(flags)))
    logger.debug("Found flag overrides, applying", { applied: flagReport.applied })
    for (const path of flagReport.applied) provenance.set(path, `flag:--${flagName}`)
    ignored.push(...flagReport.ignored)
  }

  if (ignored.length > 0) {
    logger.debug("Overrides ignored", { ignored })
  }

  return { document, documentName: opts.document.name, provenance, ignored }
}

export async function loadBootConfig<T>(opts: LoadBootConfigOptions<T>): Promise<BootConfig<T>> {
  const resolved = await resolveBootDocument(opts)

  return new BootConfig(
    decodeConfig(resolved.document, opts.schema),
    resolved.document,
    resolved.provenance,
    resolved.documentName,
    resolved.ignored,
  )
}

/** Decode one section of an already resolved document. */
export function unmarshalBootDocument<T>(document: MapNode, schema: z.ZodType<T>): T {
  return decodeConfig(document, schema)
}

async function loadDocument(source: DocumentSource): Promise<MapNode> {
  const raw = await source.load()
  if (raw === undefined || raw === null) return mapNode()

  const node = toNode(raw)
  if (node.kind !== "map") {
    throw new DocumentError(`Boot document ${source.name} is not a mapping`, {
      code: "document_invalid",
      context: { source: source.name, kind: node.kind },
    })
  }
  return lowerMapKeys(node)
}

function coversPath(prefix: string, path: string): boolean {
  return path === prefix || path.startsWith(`${prefix}.`) || path.startsWith(`${prefix}[`)
}
