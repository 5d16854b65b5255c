import { ProcessEnvSource } from "../process-env-source"

describe("ProcessEnvSource behavior", () => {
  it("uses injected env over process.env", async () => {
    const source = new ProcessEnvSource({ env: { KEEL_APP_NAME: "orders" } })

    expect(await source.load()).toEqual({ KEEL_APP_NAME: "orders" })
  })

  it("returns a copy", async () => {
    const env: Record<string, string | undefined> = { KEEL_A: "1" }
    const source = new ProcessEnvSource({ env })

    const loaded = await source.load()
    loaded.KEEL_A = "2"

    expect(env.KEEL_A).toBe("1")
  })

  it("reads process.env by default", async () => {
    vi.stubEnv("KEEL_TEST_DEFAULT_SOURCE", "yes")

    try {
      const loaded = await new ProcessEnvSource().load()

      expect(loaded.KEEL_TEST_DEFAULT_SOURCE).toBe("yes")
    } finally {
      vi.unstubAllEnvs()
    }
  })

  it("is named env", () => {
    expect(new ProcessEnvSource().name).toBe("env")
  })
})
