/**
 * Where the process runs. Matched against `realm::region::az::domain`
 * locales and against entry domains.
 */
export type LocaleEnv = {
  realm?: string
  region?: string
  az?: string
  domain?: string
}
