import { RegistryError } from "../../core/errors"
import type { EntryFS } from "../../ports/entry-fs"

const encoder = new TextEncoder()
const decoder = new TextDecoder()

export class MemoryFS implements EntryFS {
  private readonly files = new Map<string, Uint8Array>()

  constructor(
    files: Record<string, string | Uint8Array> = {},
    readonly name = "memory",
  ) {
    for (const [file, content] of Object.entries(files)) {
      this.files.set(normalize(file), typeof content === "string" ? encoder.encode(content) : content)
    }
  }

  async readFile(file: string): Promise<Uint8Array> {
    const content = this.files.get(normalize(file))
    if (!content) {
      throw new RegistryError(`Resource not found: ${file}`, {
        code: "resource_missing",
        context: { path: file },
      })
    }
    return content.slice()
  }

  async readText(file: string): Promise<string> {
    return decoder.decode(await this.readFile(file))
  }

  async exists(file: string): Promise<boolean> {
    try {
      return this.files.has(normalize(file))
    } catch (err) {
      if (err instanceof RegistryError) return false
      throw err
    }
  }

  async list(): Promise<string[]> {
    return [...this.files.keys()].sort()
  }
}

function normalize(file: string): string {
  const parts: string[] = []

  for (const part of file.split("/")) {
    if (part === "" || part === ".") continue
    if (part === "..") {
      throw new RegistryError(`Resource path escapes the root: ${file}`, {
        code: "resource_outside_root",
        context: { path: file },
      })
    }
    parts.push(part)
  }

  return parts.join("/")
}
