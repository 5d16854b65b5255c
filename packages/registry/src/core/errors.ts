import { BaseError } from "@keel/errors"

export type RegistryErrorCode = "duplicate_default" | "resource_missing" | "resource_outside_root"

export class RegistryError extends BaseError<RegistryErrorCode> {}
