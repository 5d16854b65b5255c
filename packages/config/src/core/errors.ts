import { BaseError, type ErrorContext } from "@keel/errors"

export class OverrideSyntaxError extends BaseError<"override_syntax"> {
  constructor(message: string, fragment: string, context: ErrorContext = {}) {
    super(message, { code: "override_syntax", context: { ...context, fragment } })
  }

  get fragment(): string {
    const { fragment } = this.context
    return typeof fragment === "string" ? fragment : ""
  }
}

export type DecodeIssue = { path: string; message: string }

type ZodLikeIssue = {
  path: readonly PropertyKey[]
  message: string
}

export function formatIssuePath(path: readonly PropertyKey[]): string {
  let out = ""
  for (const part of path) {
    if (typeof part === "number") out += `[${part}]`
    else out += out ? `.${String(part)}` : String(part)
  }
  return out
}

export class ConfigDecodeError extends BaseError<"config_decode"> {
  readonly issues: readonly DecodeIssue[]

  constructor(message: string, issues: DecodeIssue[], cause?: unknown) {
    super(message, {
      code: "config_decode",
      context: { issues },
      cause,
      isOperational: false,
    })
    this.issues = issues
  }

  static fromZodIssues(issues: readonly ZodLikeIssue[], pretty: string, cause?: unknown) {
    return new ConfigDecodeError(
      `Boot configuration could not be decoded:\n${pretty}`,
      issues.map((i) => ({ path: formatIssuePath(i.path), message: i.message })),
      cause,
    )
  }
}

export class DocumentError extends BaseError<"document_invalid" | "document_missing"> {}
