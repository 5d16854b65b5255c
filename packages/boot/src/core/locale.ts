import type { LocaleEnv } from "../ports/locale-env"

const WILDCARD = "*"

export function localeEnvFrom(env: Record<string, string | undefined>): LocaleEnv {
  return {
    realm: env.REALM,
    region: env.REGION,
    az: env.AZ,
    domain: env.DOMAIN,
  }
}

/**
 * Whether `locale` (`realm::region::az::domain`) selects this process.
 * Each part is `*` or must equal the matching env value.
 *
 * @example
 * isLocaleValid("*::*::*::prod", { domain: "prod" }) // true
 * isLocaleValid("*::*::*::prod", {})                 // false
 */
export function isLocaleValid(locale: string, env: LocaleEnv): boolean {
  const parts = locale.split("::")
  if (parts.length !== 4) return false

  const [realm, region, az, domain] = parts
  return (
    matches(realm, env.realm) &&
    matches(region, env.region) &&
    matches(az, env.az) &&
    matches(domain, env.domain)
  )
}

/** An empty domain means every domain. */
export function isValidDomain(domain: string | undefined, env: LocaleEnv): boolean {
  return matches(domain || WILDCARD, env.domain)
}

function matches(part: string | undefined, actual: string | undefined): boolean {
  return part === WILDCARD || part === (actual ?? "")
}
