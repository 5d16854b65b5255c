import { Command, CommanderError, Option } from "commander"
import { OverrideSyntaxError } from "./errors"

/**
 * Collect every value given to `--<flagName>` in `argv`, joined with `,`.
 *
 * Other arguments belong to the host program and are left alone.
 * Returns `""` when the flag is absent.
 */
export function readFlagOverrides(argv: readonly string[], flagName: string): string {
  const flag = `--${flagName}`
  const relevant: string[] = []

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    if (arg === undefined || arg === "--") break

    if (arg === flag) {
      relevant.push(arg)
      const next = argv[i + 1]
      if (next !== undefined) relevant.push(next)
      i++
    } else if (arg.startsWith(`${flag}=`)) {
      relevant.push(arg)
    }
  }

  if (relevant.length === 0) return ""

  const option = new Option(`${flag} <grammar>`, "override boot document values")
    .argParser((value: string, previous: string[]) => [...previous, value])
    .default([])

  const program = new Command()
    .addOption(option)
    .helpOption(false)
    .allowUnknownOption()
    .allowExcessArguments()
    .exitOverride()
    .configureOutput({ writeOut: () => {}, writeErr: () => {} })

  try {
    program.parse(relevant, { from: "user" })
  } catch (err) {
    if (err instanceof CommanderError) {
      throw new OverrideSyntaxError(`Invalid ${flag} flag: ${err.message}`, relevant.join(" "), {
        commanderCode: err.code,
      })
    }
    throw err
  }

  const values: unknown = program.getOptionValue(option.attributeName())
  if (!Array.isArray(values)) return ""

  return values.filter((v): v is string => typeof v === "string").join(",")
}
