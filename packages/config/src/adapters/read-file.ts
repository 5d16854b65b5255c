import fs from "node:fs/promises"
import path from "node:path"
import { DocumentError } from "../core/errors"

/**
 * Options shared by the file-backed sources.
 */
export type FileSourceOptions = {
  /**
   * Path to the file.
   *
   * Can be absolute or relative to `cwd`.
   *
   * @example "boot.yaml", "./config/boot.yaml"
   */
  file: string

  /**
   * Whether the file must exist.
   *
   * - `true`: Throws DocumentError("document_missing") if not found.
   * - `false`: Behaves as an empty source if not found.
   */
  required: boolean

  /**
   * Base directory for resolving relative paths.
   *
   * @default process.cwd()
   */
  cwd?: string
}

/** Reads the file, or returns `undefined` when it is optional and absent. */
export async function readSourceFile(opts: FileSourceOptions): Promise<string | undefined> {
  const filePath = path.resolve(opts.cwd ?? process.cwd(), opts.file)

  try {
    return await fs.readFile(filePath, "utf-8")
  } catch (err) {
    if (!isNotFound(err)) throw err
    if (!opts.required) return undefined

    throw new DocumentError(`File not found: ${filePath}`, {
      code: "document_missing",
      context: { file: filePath },
      cause: err,
    })
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}
