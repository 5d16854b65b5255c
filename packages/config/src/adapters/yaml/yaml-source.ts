import { parse } from "yaml"
import { DocumentError } from "../../core/errors"
import type { DocumentSource } from "../../ports/source"
import { type FileSourceOptions, readSourceFile } from "../read-file"

export type YamlSourceOptions = FileSourceOptions

export class YamlSource implements DocumentSource {
  readonly name: string

  constructor(private readonly opts: YamlSourceOptions) {
    this.name = `yaml:${opts.file}`
  }

  async load(): Promise<unknown> {
    const content = await readSourceFile(this.opts)
    if (content === undefined) return undefined

    try {
      return parse(content)
    } catch (err) {
      throw new DocumentError(`Invalid YAML in ${this.opts.file}`, {
        code: "document_invalid",
        context: { file: this.opts.file },
        cause: err,
      })
    }
  }
}
