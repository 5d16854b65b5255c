/**
 * A source of the boot document.
 *
 * A DocumentSource only *loads* the raw tree. Conversion, overrides and
 * decoding happen downstream.
 */
export interface DocumentSource {
  /**
   * Human-readable name for diagnostics and provenance.
   * Example: "yaml:boot.yaml", "object:inline"
   */
  readonly name: string

  /** Resolves to the parsed document, or `undefined` when there is none. */
  load(): Promise<unknown>
}

/**
 * A source of environment-style variables scanned for overrides.
 *
 * Sources are read in order; a later source wins for the same variable.
 */
export interface EnvSource {
  /** Example: "env", "dotenv:.env" */
  readonly name: string

  /** Returning undefined for a key means "value not provided". */
  load(): Promise<Record<string, string | undefined>>
}
