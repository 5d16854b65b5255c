import fs from "node:fs/promises"
import path from "node:path"
import { RegistryError } from "../../core/errors"
import type { EntryFS } from "../../ports/entry-fs"

export type DirectoryFSOptions = {
  rootDir: string
}

export class DirectoryFS implements EntryFS {
  readonly name: string
  private readonly rootDir: string

  constructor(options: DirectoryFSOptions) {
    this.rootDir = path.resolve(options.rootDir)
    this.name = `dir:${this.rootDir}`
  }

  async readFile(file: string): Promise<Uint8Array> {
    const filePath = this.resolve(file)

    try {
      return await fs.readFile(filePath)
    } catch (err) {
      throw this.isNotFound(err) ? missing(file, err) : err
    }
  }

  async readText(file: string): Promise<string> {
    const filePath = this.resolve(file)

    try {
      return await fs.readFile(filePath, "utf-8")
    } catch (err) {
      throw this.isNotFound(err) ? missing(file, err) : err
    }
  }

  async exists(file: string): Promise<boolean> {
    try {
      const stat = await fs.stat(this.resolve(file))
      return stat.isFile()
    } catch (err) {
      if (err instanceof RegistryError || this.isNotFound(err)) return false
      throw err
    }
  }

  async list(): Promise<string[]> {
    try {
      return (await this.walk(this.rootDir)).sort()
    } catch (err) {
      if (this.isNotFound(err)) return []
      throw err
    }
  }

  private resolve(file: string): string {
    const filePath = path.resolve(this.rootDir, file)
    const relative = path.relative(this.rootDir, filePath)
    const escapes = relative === ".." || relative.startsWith(`..${path.sep}`)

    if (relative === "" || escapes || path.isAbsolute(relative)) {
      throw new RegistryError(`Resource path escapes ${this.rootDir}: ${file}`, {
        code: "resource_outside_root",
        context: { path: file },
      })
    }
    return filePath
  }

  private async walk(dir: string, prefix = ""): Promise<string[]> {
    const entries = await fs.readdir(dir, { withFileTypes: true })
    const files: string[] = []

    for (const entry of entries) {
      const relativePath = prefix ? `${prefix}/${entry.name}` : entry.name

      if (entry.isDirectory()) {
        files.push(...(await this.walk(path.join(dir, entry.name), relativePath)))
      } else if (entry.isFile()) {
        files.push(relativePath)
      }
    }
    return files
  }

  private isNotFound(err: unknown): boolean {
    return err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "EISDIR")
  }
}

function missing(file: string, cause: unknown): RegistryError {
  return new RegistryError(`Resource not found: ${file}`, {
    code: "resource_missing",
    context: { path: file },
    cause,
  })
}
