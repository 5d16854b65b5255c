import type { MapNode, Node, ScalarNode, ScalarValue, SeqNode } from "../ports/node"
import type { OverridePath } from "../ports/override-path"
import { DocumentError } from "./errors"

export const mapNode = (entries: Iterable<[string, Node]> = []): MapNode => ({
  kind: "map",
  entries: new Map(entries),
})

export const seqNode = (items: Node[] = []): SeqNode => ({ kind: "seq", items })

export const scalarNode = (value: ScalarValue): ScalarNode => ({ kind: "scalar", value })

export const isMapNode = (node: Node | undefined): node is MapNode => node?.kind === "map"

export const isSeqNode = (node: Node | undefined): node is SeqNode => node?.kind === "seq"

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false
  if (Array.isArray(value)) return false

  const proto = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

/**
 * Convert a parsed YAML/JSON value into a Node.
 *
 * `undefined` becomes a null scalar. Dates are kept as ISO strings.
 * Anything else that is not plain data is rejected.
 */
export function toNode(value: unknown, at: string = ""): Node {
  if (value === null || value === undefined) return scalarNode(null)

  if (typeof value === "string" || typeof value === "boolean") return scalarNode(value)

  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new DocumentError(`Non-finite number at "${at}"`, {
        code: "document_invalid",
        context: { path: at },
      })
    }
    return scalarNode(value)
  }

  if (value instanceof Date) return scalarNode(value.toISOString())

  if (Array.isArray(value)) {
    return seqNode(value.map((item, i) => toNode(item, `${at}[${i}]`)))
  }

  if (value instanceof Map) {
    const node = mapNode()
    for (const [key, item] of value) {
      const k = String(key)
      node.entries.set(k, toNode(item, at ? `${at}.${k}` : k))
    }
    return node
  }

  if (isPlainObject(value)) {
    return mapNode(
      Object.entries(value).map(([k, item]) => [k, toNode(item, at ? `${at}.${k}` : k)]),
    )
  }

  throw new DocumentError(`Unsupported value of type ${typeof value} at "${at}"`, {
    code: "document_invalid",
    context: { path: at },
  })
}

export function fromNode(node: Node): unknown {
  switch (node.kind) {
    case "scalar":
      return node.value
    case "seq":
      return node.items.map(fromNode)
    case "map": {
      const out: Record<string, unknown> = {}
      for (const [k, v] of node.entries) out[k] = fromNode(v)
      return out
    }
  }
}

/** Deep copy with every map key lower-cased. On collision the later key wins. */
export function lowerKeys(node: Node): Node {
  switch (node.kind) {
    case "scalar":
      return scalarNode(node.value)
    case "seq":
      return seqNode(node.items.map(lowerKeys))
    case "map":
      return lowerMapKeys(node)
  }
}

export function lowerMapKeys(node: MapNode): MapNode {
  return mapNode([...node.entries].map(([k, v]) => [k.toLowerCase(), lowerKeys(v)]))
}

export function cloneNode(node: Node): Node {
  switch (node.kind) {
    case "scalar":
      return scalarNode(node.value)
    case "seq":
      return seqNode(node.items.map(cloneNode))
    case "map":
      return mapNode([...node.entries].map(([k, v]) => [k, cloneNode(v)]))
  }
}

export function renderPath(path: OverridePath): string {
  let out = ""
  for (const seg of path) {
    if (seg.kind === "index") out += `[${seg.index}]`
    else out += out ? `.${seg.key}` : seg.key
  }
  return out
}

/** Walk `path` from `root`, or `undefined` if any step is missing. */
export function nodeAt(root: Node, path: OverridePath): Node | undefined {
  let current: Node | undefined = root

  for (const seg of path) {
    if (seg.kind === "key") {
      current = isMapNode(current) ? current.entries.get(seg.key) : undefined
    } else {
      current = isSeqNode(current) ? current.items[seg.index] : undefined
    }
    if (!current) return undefined
  }

  return current
}
