import { unmarshalBootDocument } from "@keel/config"
import { AppInfoEntry, appInfoSectionSchema } from "../entries/app-info-entry"
import { ConfigEntry, configSectionSchema } from "../entries/config-entry"
import type { EntryFactory } from "../ports/entry-factory"
import { isLocaleValid, isValidDomain } from "./locale"

/** One AppInfoEntry from the `app:` section, present or not. */
export const appInfoFactory: EntryFactory = (document, ctx) => {
  const { app } = unmarshalBootDocument(document, appInfoSectionSchema)
  return [new AppInfoEntry(ctx.registry, app)]
}

/**
 * One ConfigEntry per `config:` item that has a name and whose locale and
 * domain select this process. Items without a locale match any.
 */
export const configFactory: EntryFactory = (document, ctx) => {
  const { config = [] } = unmarshalBootDocument(document, configSectionSchema)
  const entries: ConfigEntry[] = []

  for (const item of config) {
    if (!item.name) continue

    if (item.locale !== undefined && !isLocaleValid(item.locale, ctx.locale)) {
      ctx.logger.debug("Skipping config entry for another locale", {
        entryName: item.name,
        locale: item.locale,
      })
      continue
    }

    if (!isValidDomain(item.domain, ctx.locale)) {
      ctx.logger.debug("Skipping config entry for another domain", {
        entryName: item.name,
        domain: item.domain,
      })
      continue
    }

    entries.push(
      new ConfigEntry({
        name: item.name,
        description: item.description,
        locale: item.locale,
        domain: item.domain,
        path: item.path,
        isDefault: item.default,
        cwd: ctx.cwd,
      }),
    )
  }

  return entries
}
