import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { JsonSource } from "../json-source"

describe("JsonSource behavior", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "json-test-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true })
  })

  it("preserves nested objects", async () => {
    await fs.writeFile(
      path.join(cwd, "boot.json"),
      JSON.stringify({ gin: [{ port: 1949, enabled: true }] }),
    )

    const source = new JsonSource({ file: "boot.json", required: true, cwd })

    expect(await source.load()).toEqual({ gin: [{ port: 1949, enabled: true }] })
  })

  it("returns undefined when file missing and not required", async () => {
    const source = new JsonSource({ file: "boot.json", required: false, cwd })

    expect(await source.load()).toBeUndefined()
  })

  it("throws document_missing when file missing and required", async () => {
    const source = new JsonSource({ file: "boot.json", required: true, cwd })

    await expect(source.load()).rejects.toMatchObject({ code: "document_missing" })
  })

  it("throws document_invalid on invalid JSON", async () => {
    await fs.writeFile(path.join(cwd, "boot.json"), "{ invalid json }")

    const source = new JsonSource({ file: "boot.json", required: true, cwd })

    await expect(source.load()).rejects.toMatchObject({ code: "document_invalid" })
  })

  it("resolves path relative to cwd", async () => {
    const subdir = path.join(cwd, "config")
    await fs.mkdir(subdir)
    await fs.writeFile(path.join(subdir, "boot.json"), JSON.stringify({ key: "value" }))

    const source = new JsonSource({ file: "boot.json", required: true, cwd: subdir })

    expect(await source.load()).toEqual({ key: "value" })
  })
})
