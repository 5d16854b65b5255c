import { v7 } from "uuid"
import type { Entry } from "../ports/entry"
import type { EntryFS } from "../ports/entry-fs"
import { RegistryError } from "./errors"

export type RegistryDeps = {
  /** @default () => new Date() */
  now?: () => Date
  /** @default uuid v7 */
  generateEventId?: () => string
}

export type ServiceInfo = {
  name: string
  version: string
}

/**
 * Process-wide store of entries keyed by (kind, name), resources keyed
 * the same way, and free-form values.
 *
 * Every method runs to completion synchronously. Re-registering an entry
 * under the same (kind, name) replaces it.
 */
export class Registry {
  private readonly entries = new Map<string, Map<string, Entry>>()
  private readonly fileSystems = new Map<string, Map<string, EntryFS>>()
  private readonly values = new Map<string, unknown>()
  private readonly now: () => Date
  private readonly started: Date
  private readonly event: string
  private service: ServiceInfo = { name: "", version: "" }

  constructor(deps: RegistryDeps = {}) {
    this.now = deps.now ?? (() => new Date())
    this.started = this.now()
    this.event = deps.generateEventId ? deps.generateEventId() : v7()
  }

  // Entries

  /**
   * @throws RegistryError("duplicate_default") when `entry` is a default
   * and another entry of its kind already is.
   */
  addEntry(entry: Entry): void {
    const kind = entry.kind()
    const name = entry.name()

    if (entry.isDefault?.()) {
      const current = this.defaultOf(kind)
      if (current && current.name() !== name) {
        throw new RegistryError(
          `Entry "${name}" cannot be the default ${kind}: "${current.name()}" already is`,
          { code: "duplicate_default", context: { kind, name, current: current.name() } },
        )
      }
    }

    bucketOf(this.entries, kind).set(name, entry)
  }

  getEntry(kind: string, name: string): Entry | undefined {
    return this.entries.get(kind)?.get(name)
  }

  /** Exact lookup, falling back to the default entry of `kind`. */
  getEntryOrDefault(kind: string, name: string): Entry | undefined {
    return this.getEntry(kind, name) ?? this.defaultOf(kind)
  }

  /** Exact lookup narrowed by `guard`; `undefined` when absent or of another type. */
  getEntryAs<T extends Entry>(
    kind: string,
    name: string,
    guard: (entry: Entry) => entry is T,
  ): T | undefined {
    const entry = this.getEntry(kind, name)
    return entry && guard(entry) ? entry : undefined
  }

  listEntriesByKind(kind: string): Entry[] {
    return [...(this.entries.get(kind)?.values() ?? [])]
  }

  listEntries(): Record<string, Entry[]> {
    const out: Record<string, Entry[]> = {}
    for (const [kind, bucket] of this.entries) out[kind] = [...bucket.values()]
    return out
  }

  /** Returns whether an entry was removed. */
  removeEntry(kind: string, name: string): boolean {
    const bucket = this.entries.get(kind)
    if (!bucket?.delete(name)) return false
    if (bucket.size === 0) this.entries.delete(kind)
    return true
  }

  removeEntriesByKind(kind: string): void {
    this.entries.delete(kind)
  }

  // Resources

  /** Associates resources with (kind, name). Empty kind or name is ignored. */
  mapEntryFS(kind: string, name: string, fs: EntryFS): void {
    if (kind === "" || name === "") return
    bucketOf(this.fileSystems, kind).set(name, fs)
  }

  entryFS(kind: string, name: string): EntryFS | undefined {
    return this.fileSystems.get(kind)?.get(name)
  }

  removeEntryFS(kind: string, name: string): void {
    this.fileSystems.get(kind)?.delete(name)
  }

  // Values

  addValue(key: string, value: unknown): void {
    this.values.set(key, value)
  }

  getValue(key: string): unknown {
    return this.values.get(key)
  }

  listValues(): Record<string, unknown> {
    return Object.fromEntries(this.values)
  }

  removeValue(key: string): void {
    this.values.delete(key)
  }

  clearValues(): void {
    this.values.clear()
  }

  // Identity

  startTime(): Date {
    return new Date(this.started)
  }

  upTimeMs(): number {
    return this.now().getTime() - this.started.getTime()
  }

  eventId(): string {
    return this.event
  }

  serviceName(): string {
    return this.service.name
  }

  serviceVersion(): string {
    return this.service.version
  }

  setServiceInfo(name: string, version: string): void {
    this.service = { name, version }
  }

  private defaultOf(kind: string): Entry | undefined {
    for (const entry of this.entries.get(kind)?.values() ?? []) {
      if (entry.isDefault?.()) return entry
    }
    return undefined
  }
}

function bucketOf<T>(map: Map<string, Map<string, T>>, kind: string): Map<string, T> {
  let bucket = map.get(kind)
  if (!bucket) {
    bucket = new Map()
    map.set(kind, bucket)
  }
  return bucket
}
