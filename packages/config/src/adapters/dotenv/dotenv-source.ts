import { parse } from "dotenv"
import type { EnvSource } from "../../ports/source"
import { type FileSourceOptions, readSourceFile } from "../read-file"

export type DotenvSourceOptions = FileSourceOptions

/**
 * Reads override variables from a .env file without touching
 * `process.env`.
 */
export class DotenvSource implements EnvSource {
  readonly name: string

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
  }

  async load(): Promise<Record<string, string | undefined>> {
    const content = await readSourceFile(this.opts)
    return content === undefined ? {} : parse(content)
  }
}
