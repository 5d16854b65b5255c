export { DirectoryFS, type DirectoryFSOptions } from "./adapters/directory/directory-fs"
export { MemoryFS } from "./adapters/memory/memory-fs"
export { RegistryError, type RegistryErrorCode } from "./core/errors"
export { Registry, type RegistryDeps, type ServiceInfo } from "./core/registry"
export type { Entry, EntryContext } from "./ports/entry"
export type { EntryFS } from "./ports/entry-fs"
