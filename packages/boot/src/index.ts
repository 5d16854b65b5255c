export {
  Bootstrapper,
  type BootstrapperDeps,
  type BootstrapperOptions,
  type ExitFn,
} from "./core/bootstrapper"
export { BootError } from "./core/errors"
export { appInfoFactory, configFactory } from "./core/factories"
export { isLocaleValid, isValidDomain, localeEnvFrom } from "./core/locale"
export {
  APP_INFO_KIND,
  APP_INFO_NAME,
  type AppInfo,
  AppInfoEntry,
  type AppInfoSection,
  appInfoSectionSchema,
  DEFAULT_APP_NAME,
} from "./entries/app-info-entry"
export {
  CONFIG_KIND,
  ConfigEntry,
  type ConfigEntryOptions,
  configSectionSchema,
  isConfigEntry,
} from "./entries/config-entry"
export type { EntryFactory, FactoryContext } from "./ports/entry-factory"
export type { LocaleEnv } from "./ports/locale-env"
