import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { describeEntryFSContract } from "../../../ports/__tests__/entry-fs.contract"
import { DirectoryFS } from "../directory-fs"

describeEntryFSContract({
  name: "DirectoryFS",
  make: async () => {
    const parent = await fs.mkdtemp(path.join(os.tmpdir(), "keel-entry-fs-"))
    const rootDir = path.join(parent, "assets")

    await fs.mkdir(path.join(rootDir, "docs"), { recursive: true })
    await fs.writeFile(path.join(rootDir, "index.html"), "<h1>hi</h1>")
    await fs.writeFile(path.join(rootDir, "docs", "api.yaml"), "openapi: 3.0.0")
    await fs.writeFile(path.join(parent, "outside.txt"), "secret")

    return {
      fs: new DirectoryFS({ rootDir }),
      cleanup: () => fs.rm(parent, { recursive: true, force: true }),
    }
  },
})

describe("DirectoryFS behavior", () => {
  it("lists nothing for a missing root", async () => {
    const fs = new DirectoryFS({ rootDir: path.join(os.tmpdir(), "keel-does-not-exist") })

    expect(await fs.list()).toEqual([])
  })

  it("treats a directory as a missing file", async () => {
    const parent = await fs.mkdtemp(path.join(os.tmpdir(), "keel-entry-fs-"))
    await fs.mkdir(path.join(parent, "sub"))

    try {
      const dirFs = new DirectoryFS({ rootDir: parent })

      expect(await dirFs.exists("sub")).toBe(false)
      await expect(dirFs.readText("sub")).rejects.toMatchObject({ code: "resource_missing" })
    } finally {
      await fs.rm(parent, { recursive: true, force: true })
    }
  })

  it("reads below a filesystem root", async () => {
    const parent = await fs.mkdtemp(path.join(os.tmpdir(), "keel-entry-fs-"))
    const file = path.join(parent, "boot.yaml")
    await fs.writeFile(file, "app: {}")

    try {
      const root = path.parse(file).root
      const rootFs = new DirectoryFS({ rootDir: root })

      expect(await rootFs.readText(path.relative(root, file))).toBe("app: {}")
      await expect(rootFs.readText(".")).rejects.toMatchObject({
        code: "resource_outside_root",
      })
    } finally {
      await fs.rm(parent, { recursive: true, force: true })
    }
  })
})
