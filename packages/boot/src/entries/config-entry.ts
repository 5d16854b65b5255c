import path from "node:path"
import {
  type DocumentSource,
  DocumentError,
  fromNode,
  JsonSource,
  lowerMapKeys,
  type MapNode,
  mapNode,
  nodeAt,
  parsePath,
  toNode,
  YamlSource,
} from "@keel/config"
import type { Entry, EntryContext } from "@keel/registry"
import { customAlphabet } from "nanoid"
import { z } from "zod"

export const CONFIG_KIND = "config"

const DEFAULT_DESCRIPTION = "Reads a user configuration file."

const randomSuffix = customAlphabet("abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ", 4)

export const configSectionSchema = z.object({
  config: z
    .array(
      z.object({
        name: z.string().optional(),
        description: z.string().optional(),
        locale: z.string().optional(),
        path: z.string(),
        domain: z.string().optional(),
        default: z.boolean().optional(),
      }),
    )
    .optional(),
})

export type ConfigEntryOptions = {
  /** @default "config-" plus four random letters */
  name?: string
  description?: string
  locale?: string
  domain?: string
  /** JSON when it ends in `.json`, YAML otherwise. */
  path: string
  isDefault?: boolean
  /** @default process.cwd() */
  cwd?: string
}

/**
 * A user configuration file, read on bootstrap. A missing file reads as
 * empty. Lookups are case-insensitive.
 */
export class ConfigEntry implements Entry {
  readonly path: string
  private readonly entryName: string
  private document: MapNode = mapNode()

  constructor(private readonly opts: ConfigEntryOptions) {
    this.entryName = opts.name || `config-${randomSuffix()}`
    this.path = path.resolve(opts.cwd ?? process.cwd(), opts.path)
  }

  async bootstrap(ctx: EntryContext): Promise<void> {
    const source = this.source()
    const raw = await source.load()

    if (raw === undefined || raw === null) {
      ctx.logger.warn("Config file not found, using empty config", { file: this.path })
      return
    }

    const node = toNode(raw)
    if (node.kind !== "map") {
      throw new DocumentError(`Config file ${this.path} is not a mapping`, {
        code: "document_invalid",
        context: { file: this.path, kind: node.kind },
      })
    }

    this.document = lowerMapKeys(node)
  }

  interrupt(_ctx: EntryContext): void {}

  /**
   * Value at a dotted path such as `db.hosts[0]`, or `undefined`.
   * The empty path returns the whole file.
   */
  get(key: string): unknown {
    if (key === "") return fromNode(this.document)

    const found = nodeAt(this.document, parsePath(key.toLowerCase(), key))
    return found ? fromNode(found) : undefined
  }

  all(): Record<string, unknown> {
    const out: Record<string, unknown> = {}
    for (const [key, value] of this.document.entries) out[key] = fromNode(value)
    return out
  }

  name(): string {
    return this.entryName
  }

  kind(): string {
    return CONFIG_KIND
  }

  describe(): string {
    return JSON.stringify(this.toJSON())
  }

  isDefault(): boolean {
    return this.opts.isDefault ?? false
  }

  locale(): string {
    return this.opts.locale ?? ""
  }

  domain(): string {
    return this.opts.domain ?? ""
  }

  toJSON(): Record<string, unknown> {
    return {
      entryName: this.entryName,
      entryKind: CONFIG_KIND,
      description: this.opts.description || DEFAULT_DESCRIPTION,
      locale: this.locale(),
      domain: this.domain(),
      path: this.path,
      default: this.isDefault(),
    }
  }

  private source(): DocumentSource {
    const file = { file: this.path, required: false }
    return path.extname(this.path).toLowerCase() === ".json"
      ? new JsonSource(file)
      : new YamlSource(file)
  }
}

export function isConfigEntry(entry: Entry): entry is ConfigEntry {
  return entry instanceof ConfigEntry
}
