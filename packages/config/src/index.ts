export { DotenvSource, type DotenvSourceOptions } from "./adapters/dotenv/dotenv-source"
export {
  ProcessEnvSource,
  type ProcessEnvSourceOptions,
} from "./adapters/env/process-env-source"
export { JsonSource, type JsonSourceOptions } from "./adapters/json/json-source"
export { ObjectSource } from "./adapters/object/object-source"
export type { FileSourceOptions } from "./adapters/read-file"
export { YamlSource, type YamlSourceOptions } from "./adapters/yaml/yaml-source"
export { BootConfig, type Provenance } from "./core/boot-config"
export { decodeConfig } from "./core/decode"
export {
  type EnvOverride,
  type EnvOverrides,
  envKeyToPath,
  parseEnvOverrides,
  type RejectedEnvOverride,
} from "./core/env-overrides"
export {
  ConfigDecodeError,
  type DecodeIssue,
  DocumentError,
  formatIssuePath,
  OverrideSyntaxError,
} from "./core/errors"
export { readFlagOverrides } from "./core/flag-overrides"
export {
  DEFAULT_ENV_PREFIX,
  DEFAULT_FLAG_NAME,
  type LoadBootConfigOptions,
  loadBootConfig,
  type ResolvedDocument,
  type ResolveDocumentOptions,
  resolveBootDocument,
  unmarshalBootDocument,
} from "./core/load"
export { type MergeReport, mergeNode } from "./core/merge"
export {
  cloneNode,
  fromNode,
  isMapNode,
  isSeqNode,
  lowerKeys,
  lowerMapKeys,
  mapNode,
  nodeAt,
  renderPath,
  scalarNode,
  seqNode,
  toNode,
} from "./core/node"
export {
  assign,
  buildOverrideNode,
  parseAssignments,
  parseOverrides,
  parsePath,
  parseValue,
  typedScalar,
} from "./core/parse-overrides"
export type {
  MapNode,
  Node,
  NodeKind,
  ScalarNode,
  ScalarValue,
  SeqNode,
} from "./ports/node"
export type { OverrideAssignment, OverridePath, PathSegment } from "./ports/override-path"
export type { DocumentSource, EnvSource } from "./ports/source"
