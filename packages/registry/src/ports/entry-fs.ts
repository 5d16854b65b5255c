/**
 * Read-only resources associated with an entry (templates, static
 * assets, documentation files).
 *
 * Paths are relative and `/`-separated. Paths that leave the resource
 * root are rejected.
 */
export interface EntryFS {
  readonly name: string

  /** @throws RegistryError("resource_missing") */
  readFile(path: string): Promise<Uint8Array>

  /** UTF-8 contents. @throws RegistryError("resource_missing") */
  readText(path: string): Promise<string>

  exists(path: string): Promise<boolean>

  /** Every file path, sorted. */
  list(): Promise<string[]>
}
