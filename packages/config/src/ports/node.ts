export type ScalarValue = string | number | boolean | null

export type MapNode = { kind: "map"; entries: Map<string, Node> }
export type SeqNode = { kind: "seq"; items: Node[] }
export type ScalarNode = { kind: "scalar"; value: ScalarValue }

/**
 * Generic tree for configuration documents and override structures.
 *
 * Sequence slots created by an override but never assigned hold a `null`
 * scalar.
 */
export type Node = MapNode | SeqNode | ScalarNode

export type NodeKind = Node["kind"]
