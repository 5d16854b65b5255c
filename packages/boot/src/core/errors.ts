import { BaseError } from "@keel/errors"

export class BootError extends BaseError<"bootstrap_failed" | "entry_bootstrap"> {}
