import { z } from "zod"
import type { Node } from "../ports/node"
import { ConfigDecodeError } from "./errors"
import { fromNode, isPlainObject } from "./node"

/**
 * Decode a node through a zod schema.
 *
 * Map keys are matched to object fields case-insensitively; the field
 * name declared in the schema wins. Fails with ConfigDecodeError listing
 * every issue.
 */
export function decodeConfig<T>(node: Node, schema: z.ZodType<T>): T {
  const result = schema.safeParse(alignKeys(fromNode(node), schema))

  if (!result.success) {
    throw ConfigDecodeError.fromZodIssues(
      result.error.issues,
      z.prettifyError(result.error),
      result.error,
    )
  }

  return result.data
}

function alignKeys(value: unknown, schema: unknown): unknown {
  const inner = unwrap(schema)

  if (inner instanceof z.ZodUnion) {
    return alignKeys(value, bestOption(value, inner.options))
  }

  if (inner instanceof z.ZodObject && isPlainObject(value)) {
    const shape: Record<string, unknown> = inner.shape
    const declared = declaredKeys(inner)
    const out: Record<string, unknown> = {}

    for (const [key, item] of Object.entries(value)) {
      const field = declared.get(key.toLowerCase()) ?? key
      out[field] = alignKeys(item, shape[field])
    }
    return out
  }

  if (inner instanceof z.ZodArray && Array.isArray(value)) {
    return value.map((item) => alignKeys(item, inner.element))
  }

  if (inner instanceof z.ZodRecord && isPlainObject(value)) {
    const out: Record<string, unknown> = {}
    for (const [key, item] of Object.entries(value)) out[key] = alignKeys(item, inner.valueType)
    return out
  }

  return value
}

/** Strip wrappers down to the schema that sees the raw input. */
function unwrap(schema: unknown): unknown {
  let current = schema
  for (;;) {
    if (
      current instanceof z.ZodOptional ||
      current instanceof z.ZodNullable ||
      current instanceof z.ZodDefault ||
      current instanceof z.ZodCatch ||
      current instanceof z.ZodReadonly ||
      current instanceof z.ZodLazy
    ) {
      current = current.unwrap()
    } else if (current instanceof z.ZodPipe) {
      // A preprocess step sees the raw input first; alignment follows its output schema.
      current = current.in instanceof z.ZodTransform ? current.out : current.in
    } else {
      return current
    }
  }
}

/**
 * The union option whose object fields match the most keys of `value`.
 * Ties go to the earlier option.
 */
function bestOption(value: unknown, options: readonly unknown[]): unknown {
  if (!isPlainObject(value)) {
    return options.find((option) => {
      const inner = unwrap(option)
      return Array.isArray(value) ? inner instanceof z.ZodArray : false
    })
  }

  const keys = Object.keys(value).map((key) => key.toLowerCase())
  let best: unknown
  let bestScore = -1

  for (const option of options) {
    const inner = unwrap(option)
    if (!(inner instanceof z.ZodObject || inner instanceof z.ZodRecord)) continue

    const score =
      inner instanceof z.ZodObject ? keys.filter((k) => declaredKeys(inner).has(k)).length : 0
    if (score > bestScore) {
      best = option
      bestScore = score
    }
  }
  return best
}

function declaredKeys(schema: z.ZodObject): Map<string, string> {
  return new Map(Object.keys(schema.shape).map((k) => [k.toLowerCase(), k]))
}
