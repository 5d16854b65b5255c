import type { MapNode } from "../ports/node"

export type Provenance = ReadonlyMap<string, string>

/**
 * Decoded boot configuration together with the merged document it came
 * from.
 *
 * @example
 * ```typescript
 * const config = await loadBootConfig({
 *   schema: z.object({ gin: z.array(z.object({ port: z.number() })) }),
 *   document: new YamlSource({ file: "boot.yaml", required: true }),
 * })
 *
 * config.value.gin[0]?.port   // 2008
 * config.explain("gin[0].port") // "flag:--rkset"
 * ```
 */
export class BootConfig<T> {
  constructor(
    private readonly data: T,
    readonly document: MapNode,
    private readonly provenance: Provenance,
    private readonly documentName: string,
    private readonly ignored: readonly string[],
  ) {}

  get value(): T {
    return this.data
  }

  /**
   * Which source set the value at `path` (rendered as `gin[0].port`).
   * Paths no override touched come from the document.
   */
  explain(path: string): string {
    return this.provenance.get(path) ?? this.documentName
  }

  /** Names of every source that contributed at least one value. */
  sourcesUsed(): string[] {
    return [...new Set([this.documentName, ...this.provenance.values()])]
  }

  /** Override paths dropped by the merge (unknown key or kind mismatch). */
  ignoredOverrides(): string[] {
    return [...this.ignored]
  }
}
