import { DocumentError } from "../../core/errors"
import type { DocumentSource } from "../../ports/source"
import { type FileSourceOptions, readSourceFile } from "../read-file"

export type JsonSourceOptions = FileSourceOptions

export class JsonSource implements DocumentSource {
  readonly name: string

  constructor(private readonly opts: JsonSourceOptions) {
    this.name = `json:${this.opts.file}`
  }

  async load(): Promise<unknown> {
    const content = await readSourceFile(this.opts)
    if (content === undefined) return undefined

    try {
      return JSON.parse(content)
    } catch (err) {
      throw new DocumentError(`Invalid JSON in ${this.opts.file}`, {
        code: "document_invalid",
        context: { file: this.opts.file },
        cause: err,
      })
    }
  }
}
