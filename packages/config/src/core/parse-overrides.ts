import type { MapNode, Node, ScalarValue, SeqNode } from "../ports/node"
import type { OverrideAssignment, OverridePath, PathSegment } from "../ports/override-path"
import { OverrideSyntaxError } from "./errors"
import { mapNode, renderPath, scalarNode, seqNode } from "./node"

const INTEGER = /^[+-]?\d+$/
const DIGITS = /^\d+$/

/**
 * Parse an override string such as `gin[0].port=2008,gin[0].enabled=false`
 * into a map node.
 *
 * A backslash makes the next character literal. A value wrapped in braces
 * (`tags={a,b}`) is a sequence. Empty input is an empty map.
 */
export function parseOverrides(input: string): MapNode {
  return buildOverrideNode(parseAssignments(input))
}

export function parseAssignments(input: string): OverrideAssignment[] {
  if (input.trim() === "") return []

  const parts = splitAssignments(input)
  if (parts.at(-1) === "") parts.pop()

  return parts.map((raw) => {
    if (raw === "") {
      throw new OverrideSyntaxError("Empty assignment in override string", input)
    }

    const eq = indexOfUnescaped(raw, "=")
    if (eq < 0) {
      throw new OverrideSyntaxError(`key "${unescapeText(raw)}" has no value`, raw)
    }

    return {
      path: parsePath(raw.slice(0, eq), raw),
      value: parseValue(raw.slice(eq + 1), raw),
      origin: raw,
    }
  })
}

/** Parse the path half of an assignment: `a.b[2].c`. */
export function parsePath(key: string, origin: string = key): OverridePath {
  const path: OverridePath = []
  const fail = (reason: string) =>
    new OverrideSyntaxError(`Malformed override path "${key}": ${reason}`, origin)

  let i = 0
  for (;;) {
    let name = ""
    while (i < key.length && key.charAt(i) !== "." && key.charAt(i) !== "[") {
      const ch = key.charAt(i)
      if (ch === "]") throw fail('unmatched "]"')
      if (ch === "\\") i++
      name += key.charAt(i)
      i++
    }
    if (name === "") throw fail("empty key segment")
    path.push({ kind: "key", key: name })

    while (key.charAt(i) === "[") {
      const close = key.indexOf("]", i + 1)
      if (close < 0) throw fail('unmatched "["')

      const digits = key.slice(i + 1, close)
      if (!DIGITS.test(digits)) throw fail(`invalid index "${digits}"`)

      path.push({ kind: "index", index: Number(digits) })
      i = close + 1
    }

    if (i >= key.length) return path
    if (key.charAt(i) !== ".") throw fail(`unexpected "${key.slice(i)}" after index`)
    i++
  }
}

/** Parse the value half of an assignment into a scalar or a sequence of scalars. */
export function parseValue(raw: string, origin: string = raw): Node {
  if (!raw.startsWith("{")) return scalarNode(typedScalar(unescapeText(raw)))

  const close = indexOfUnescaped(raw, "}")
  if (close < 0) throw new OverrideSyntaxError("list must terminate with '}'", origin)
  if (close !== raw.length - 1) {
    throw new OverrideSyntaxError(`unexpected "${raw.slice(close + 1)}" after list`, origin)
  }

  const inner = raw.slice(1, close)
  if (inner === "") return seqNode()

  const items = splitUnescaped(inner, ",")
  return seqNode(items.map((item) => scalarNode(typedScalar(unescapeText(item)))))
}

/**
 * `true`/`false` (any case) are booleans, `null` is null, decimal integers
 * without a leading zero (and `0` itself) are numbers. Everything else
 * stays a string.
 */
export function typedScalar(text: string): ScalarValue {
  const lower = text.toLowerCase()
  if (lower === "true") return true
  if (lower === "false") return false
  if (lower === "null") return null
  if (text === "0") return 0

  if (!text.startsWith("0") && INTEGER.test(text)) {
    const n = Number(text)
    if (Number.isSafeInteger(n)) return n
  }

  return text
}

export function buildOverrideNode(assignments: Iterable<OverrideAssignment>): MapNode {
  const root = mapNode()
  for (const assignment of assignments) assign(root, assignment)
  return root
}

/**
 * Write one assignment into `root`, creating maps and sequences along the
 * path. Sequences are padded with null scalars, and only those padding
 * slots may be replaced by a node of another kind.
 *
 * Throws when the path crosses, or the value replaces, a node of a
 * different kind: a scalar (an explicit `null` included) never turns into
 * a map or sequence, and the reverse. Nothing is written in that case.
 */
export function assign(root: MapNode, { path, value, origin }: OverrideAssignment): void {
  let container: MapNode | SeqNode = root

  for (const [i, seg] of path.entries()) {
    const existing = childOf(container, seg)
    const next = path[i + 1]

    if (!next) {
      if (existing && existing.kind !== value.kind && !isPadding(container, existing)) {
        throw conflict(path.slice(0, i + 1), existing.kind, value.kind, origin)
      }
      setChild(container, seg, value)
      return
    }

    const wanted = next.kind === "key" ? "map" : "seq"

    if (existing === undefined || isPadding(container, existing)) {
      const created: MapNode | SeqNode = wanted === "map" ? mapNode() : seqNode()
      setChild(container, seg, created)
      container = created
    } else if (existing.kind === "map" && wanted === "map") {
      container = existing
    } else if (existing.kind === "seq" && wanted === "seq") {
      container = existing
    } else {
      throw conflict(path.slice(0, i + 1), existing.kind, wanted, origin)
    }
  }
}

function childOf(container: MapNode | SeqNode, seg: PathSegment): Node | undefined {
  if (container.kind === "map") {
    return seg.kind === "key" ? container.entries.get(seg.key) : undefined
  }
  return seg.kind === "index" ? container.items[seg.index] : undefined
}

function setChild(container: MapNode | SeqNode, seg: PathSegment, node: Node): void {
  if (container.kind === "map" && seg.kind === "key") {
    container.entries.set(seg.key, node)
    return
  }
  if (container.kind === "seq" && seg.kind === "index") {
    while (container.items.length < seg.index) container.items.push(scalarNode(null))
    container.items[seg.index] = node
    return
  }
  // Only reachable for a path whose first segment is an index.
  throw new OverrideSyntaxError("Override path must start with a key", renderPath([seg]))
}

/** A null slot of a sequence, as left by padding. */
function isPadding(container: MapNode | SeqNode, node: Node): boolean {
  return container.kind === "seq" && node.kind === "scalar" && node.value === null
}

function conflict(at: OverridePath, found: string, wanted: string, origin: string) {
  return new OverrideSyntaxError(
    `invalid format: "${renderPath(at)}" is a ${found} and cannot hold a ${wanted}`,
    origin,
  )
}

function splitAssignments(input: string): string[] {
  const parts: string[] = []
  let current = ""
  let seenEquals = false
  let inList = false

  for (let i = 0; i < input.length; i++) {
    const ch = input.charAt(i)

    if (ch === "\\") {
      current += ch + input.charAt(i + 1)
      i++
    } else if (inList) {
      if (ch === "}") inList = false
      current += ch
    } else if (ch === ",") {
      parts.push(current)
      current = ""
      seenEquals = false
    } else if (ch === "=" && !seenEquals) {
      seenEquals = true
      inList = input.charAt(i + 1) === "{"
      current += ch
    } else {
      current += ch
    }
  }

  if (inList) throw new OverrideSyntaxError("list must terminate with '}'", current)

  parts.push(current)
  return parts
}

function indexOfUnescaped(text: string, target: string): number {
  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i)
    if (ch === "\\") i++
    else if (ch === target) return i
  }
  return -1
}

function splitUnescaped(text: string, sep: string): string[] {
  const parts: string[] = []
  let start = 0

  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i)
    if (ch === "\\") i++
    else if (ch === sep) {
      parts.push(text.slice(start, i))
      start = i + 1
    }
  }

  parts.push(text.slice(start))
  return parts
}

function unescapeText(text: string): string {
  return text.replace(/\\(.?)/gs, "$1")
}
