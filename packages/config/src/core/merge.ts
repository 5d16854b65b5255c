import type { MapNode, Node, SeqNode } from "../ports/node"
import type { OverridePath } from "../ports/override-path"
import { renderPath } from "./node"

export type MergeReport = {
  /** Paths whose value was replaced. */
  applied: string[]
  /** Override paths that were absent from the base or of a different kind. */
  ignored: string[]
}

/**
 * Merge `override` into `base` in place.
 *
 * - only keys and indices already present in `base` are touched
 * - maps recurse, sequences recurse up to the shorter length
 * - scalars replace when their value types match
 * - a null slot in an override sequence is a gap and replaces nothing
 */
export function mergeNode(base: MapNode, override: MapNode): MergeReport {
  const report: MergeReport = { applied: [], ignored: [] }
  mergeMap(base, override, [], report)
  return report
}

function mergeMap(base: MapNode, override: MapNode, at: OverridePath, report: MergeReport) {
  for (const [key, value] of override.entries) {
    const path: OverridePath = [...at, { kind: "key", key }]
    const current = base.entries.get(key)

    if (current === undefined) {
      report.ignored.push(renderPath(path))
      continue
    }

    const merged = mergeValue(current, value, path, report)
    if (merged) base.entries.set(key, merged)
  }
}

function mergeSeq(base: SeqNode, override: SeqNode, at: OverridePath, report: MergeReport) {
  for (const [index, value] of override.items.entries()) {
    const path: OverridePath = [...at, { kind: "index", index }]
    const current = base.items[index]

    if (value.kind === "scalar" && value.value === null) continue
    if (current === undefined) {
      report.ignored.push(renderPath(path))
      continue
    }

    const merged = mergeValue(current, value, path, report)
    if (merged) base.items[index] = merged
  }
}

/** Returns the replacement for `current`, or `undefined` to keep it. */
function mergeValue(
  current: Node,
  value: Node,
  path: OverridePath,
  report: MergeReport,
): Node | undefined {
  if (current.kind === "map" && value.kind === "map") {
    mergeMap(current, value, path, report)
    return undefined
  }

  if (current.kind === "seq" && value.kind === "seq") {
    mergeSeq(current, value, path, report)
    return undefined
  }

  if (current.kind === "scalar" && value.kind === "scalar" && sameType(current.value, value.value)) {
    report.applied.push(renderPath(path))
    return value
  }

  report.ignored.push(renderPath(path))
  return undefined
}

function sameType(a: unknown, b: unknown): boolean {
  if (a === null || b === null) return a === b
  return typeof a === typeof b
}
