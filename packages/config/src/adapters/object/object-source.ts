import type { DocumentSource } from "../../ports/source"

/** In-memory boot document. Each load returns a fresh deep copy. */
export class ObjectSource implements DocumentSource {
  readonly name: string

  constructor(
    private readonly document: Record<string, unknown>,
    label = "inline",
  ) {
    this.name = `object:${label}`
  }

  async load(): Promise<unknown> {
    return structuredClone(this.document)
  }
}
