export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to errors: the offending fragment, the
 * entry kind and name, the decode issues.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode

  readonly context: ErrorContext

  /**
   * `true` for expected runtime failures (a malformed override, a missing
   * boot document), `false` for failures the process must not run past
   * (a boot configuration that does not decode).
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe error shape for log payloads.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
