import type { Node } from "./node"

export type PathSegment = { kind: "key"; key: string } | { kind: "index"; index: number }

/** `a.b[2].c` is `[key a, key b, index 2, key c]`. */
export type OverridePath = PathSegment[]

export type OverrideAssignment = {
  path: OverridePath
  value: Node
  /** Raw text the assignment came from, for diagnostics. */
  origin: string
}
