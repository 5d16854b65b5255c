import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { DotenvSource } from "../dotenv-source"

describe("DotenvSource behavior", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "dotenv-test-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true })
  })

  it("parses key=value pairs", async () => {
    await fs.writeFile(path.join(cwd, ".env"), "KEEL_GIN_0_PORT=2008\nKEEL_APP_NAME=orders")

    const source = new DotenvSource({ file: ".env", required: true, cwd })

    expect(await source.load()).toEqual({ KEEL_GIN_0_PORT: "2008", KEEL_APP_NAME: "orders" })
  })

  it("handles quotes and comments", async () => {
    await fs.writeFile(
      path.join(cwd, ".env"),
      `# overrides\nKEEL_A='single quoted'\nKEEL_B="double quoted"`,
    )

    const source = new DotenvSource({ file: ".env", required: true, cwd })

    expect(await source.load()).toEqual({ KEEL_A: "single quoted", KEEL_B: "double quoted" })
  })

  it("does not modify process.env", async () => {
    await fs.writeFile(path.join(cwd, ".env"), "KEEL_DOTENV_ONLY=1")

    await new DotenvSource({ file: ".env", required: true, cwd }).load()

    expect(process.env.KEEL_DOTENV_ONLY).toBeUndefined()
  })

  it("returns empty object when file missing and not required", async () => {
    const source = new DotenvSource({ file: ".env", required: false, cwd })

    expect(await source.load()).toEqual({})
  })

  it("throws when file missing and required", async () => {
    const source = new DotenvSource({ file: ".env", required: true, cwd })

    await expect(source.load()).rejects.toMatchObject({ code: "document_missing" })
  })
})
