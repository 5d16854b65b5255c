import type { Entry, EntryContext, Registry } from "@keel/registry"
import { z } from "zod"

export const APP_INFO_KIND = "app"
export const APP_INFO_NAME = "AppInfoDefault"
export const DEFAULT_APP_NAME = "keel"

const DEFAULT_DESCRIPTION = "Describes the application: name, version, links and maintainers."

export const appInfoSectionSchema = z.object({
  app: z
    .object({
      name: z.string().optional(),
      version: z.string().optional(),
      description: z.string().optional(),
      keywords: z.array(z.string()).optional(),
      homeUrl: z.string().optional(),
      iconUrl: z.string().optional(),
      docsUrl: z.array(z.string()).optional(),
      maintainers: z.array(z.string()).optional(),
    })
    .optional(),
})

export type AppInfoSection = NonNullable<z.infer<typeof appInfoSectionSchema>["app"]>

export type AppInfo = {
  name: string
  version: string
  description: string
  keywords: string[]
  homeUrl: string
  iconUrl: string
  docsUrl: string[]
  maintainers: string[]
}

/**
 * Application metadata. Bootstrapping publishes the name and version as
 * the registry's service identity.
 */
export class AppInfoEntry implements Entry {
  readonly info: AppInfo

  constructor(
    private readonly registry: Registry,
    section: AppInfoSection = {},
  ) {
    this.info = {
      name: section.name || DEFAULT_APP_NAME,
      version: section.version ?? "",
      description: section.description || DEFAULT_DESCRIPTION,
      keywords: section.keywords ?? [],
      homeUrl: section.homeUrl ?? "",
      iconUrl: section.iconUrl ?? "",
      docsUrl: section.docsUrl ?? [],
      maintainers: section.maintainers ?? [],
    }
  }

  bootstrap(ctx: EntryContext): void {
    this.registry.setServiceInfo(this.info.name, this.info.version)
    ctx.logger.debug("Service identity set", {
      service: this.info.name,
      version: this.info.version,
    })
  }

  interrupt(_ctx: EntryContext): void {}

  name(): string {
    return APP_INFO_NAME
  }

  kind(): string {
    return APP_INFO_KIND
  }

  describe(): string {
    return JSON.stringify(this.toJSON())
  }

  toJSON(): Record<string, unknown> {
    return {
      entryName: this.name(),
      entryKind: this.kind(),
      ...this.info,
    }
  }
}
