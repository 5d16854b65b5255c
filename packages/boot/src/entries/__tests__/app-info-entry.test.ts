import type { Logger } from "@keel/logger"
import { Registry } from "@keel/registry"
import { mock } from "vitest-mock-extended"
import { AppInfoEntry, DEFAULT_APP_NAME } from "../app-info-entry"

describe("AppInfoEntry", () => {
  it("fills defaults for an absent section", () => {
    const entry = new AppInfoEntry(new Registry())

    expect(entry.info).toEqual({
      name: DEFAULT_APP_NAME,
      version: "",
      description: "Describes the application: name, version, links and maintainers.",
      keywords: [],
      homeUrl: "",
      iconUrl: "",
      docsUrl: [],
      maintainers: [],
    })
  })

  it("publishes the service identity on bootstrap", () => {
    const registry = new Registry()
    const entry = new AppInfoEntry(registry, { name: "orders", version: "1.4.0" })

    expect(registry.serviceName()).toBe("")

    entry.bootstrap({ signal: new AbortController().signal, logger: mock<Logger>() })

    expect(registry.serviceName()).toBe("orders")
    expect(registry.serviceVersion()).toBe("1.4.0")
  })

  it("identifies as the default app entry", () => {
    const entry = new AppInfoEntry(new Registry(), { keywords: ["billing"] })

    expect(entry.kind()).toBe("app")
    expect(entry.name()).toBe("AppInfoDefault")
    expect(JSON.parse(entry.describe())).toMatchObject({
      entryName: "AppInfoDefault",
      entryKind: "app",
      name: "keel",
      keywords: ["billing"],
    })
  })
})
