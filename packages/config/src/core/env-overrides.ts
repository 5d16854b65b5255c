import { type Logger, NullLogger } from "@keel/logger"
import type { MapNode } from "../ports/node"
import type { OverridePath } from "../ports/override-path"
import { OverrideSyntaxError } from "./errors"
import { fromNode, mapNode, renderPath } from "./node"
import { assign, parseValue } from "./parse-overrides"

const INDEX_TOKEN = /^\d+$/

export type EnvOverride = {
  variable: string
  path: string
  value: unknown
}

export type RejectedEnvOverride = {
  variable: string
  reason: string
}

export type EnvOverrides = {
  node: MapNode
  applied: EnvOverride[]
  rejected: RejectedEnvOverride[]
}

/**
 * `PREFIX_ITEMS_0_NAME` → `items[0].name`.
 *
 * Returns `undefined` when `name` does not carry the prefix. A numeric
 * token becomes an index on the segment before it; a leading one has no
 * segment to attach to and is dropped.
 */
export function envKeyToPath(name: string, prefix: string): OverridePath | undefined {
  const head = `${prefix.toUpperCase()}_`
  if (!name.toUpperCase().startsWith(head)) return undefined

  const path: OverridePath = []

  for (const token of name.slice(head.length).toLowerCase().split("_")) {
    if (token === "") {
      throw new OverrideSyntaxError(`Environment key "${name}" has an empty segment`, name)
    }

    if (INDEX_TOKEN.test(token)) {
      if (path.length > 0) path.push({ kind: "index", index: Number(token) })
      continue
    }

    path.push({ kind: "key", key: token })
  }

  if (path.length === 0) {
    throw new OverrideSyntaxError(`Environment key "${name}" names no path`, name)
  }

  return path
}

/**
 * Collect every `PREFIX_*` variable into an override node.
 *
 * Malformed variables are skipped and reported in `rejected`. Variables
 * are visited in name order so conflicts resolve the same way every run.
 */
export function parseEnvOverrides(
  env: Readonly<Record<string, string | undefined>>,
  prefix: string,
  logger: Logger = new NullLogger(),
): EnvOverrides {
  const node = mapNode()
  const applied: EnvOverride[] = []
  const rejected: RejectedEnvOverride[] = []

  for (const variable of Object.keys(env).sort()) {
    const raw = env[variable]
    if (raw === undefined) continue

    try {
      const path = envKeyToPath(variable, prefix)
      if (!path) continue

      const value = parseValue(raw, variable)
      assign(node, { path, value, origin: variable })

      applied.push({ variable, path: renderPath(path), value: fromNode(value) })
    } catch (err) {
      if (!(err instanceof OverrideSyntaxError)) throw err

      rejected.push({ variable, reason: err.message })
      logger.warn("Skipping malformed env override", { variable, err })
    }
  }

  if (applied.length > 0) {
    logger.debug("Found env overrides, applying", {
      overrides: applied.map((o) => `${o.variable} -> ${o.path}`),
    })
  }

  return { node, applied, rejected }
}
