import type { AppError, SerializedError } from "../ports/error"

export type SerializeOptions = Readonly<{
  /** @default false */
  includeStack?: boolean
}>

/**
 * Serialize any thrown value to a consistent shape.
 *
 * - AppErrors keep their code, context and operational flag
 * - Plain Errors get code "unknown" and are marked non-operational
 * - Anything else is wrapped as "NonErrorThrown"
 */
export function serializeError(err: unknown, options?: SerializeOptions): SerializedError {
  const includeStack = options?.includeStack ?? false

  if (isAppErrorLike(err)) {
    return {
      name: err.name,
      code: err.code,
      message: err.message,
      context: { ...err.context },
      isOperational: err.isOperational,
      timestamp: err.timestamp.toISOString(),
      ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
      ...(includeStack && err.stack && { stack: err.stack }),
    }
  }

  if (err instanceof Error) {
    return {
      name: err.name,
      code: "unknown",
      message: err.message,
      context: {},
      isOperational: false,
      timestamp: new Date().toISOString(),
      ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
      ...(includeStack && err.stack && { stack: err.stack }),
    }
  }

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? err : "Unknown error",
    context: { value: err },
    isOperational: false,
    timestamp: new Date().toISOString(),
  }
}

function isAppErrorLike(err: unknown): err is AppError {
  if (!(err instanceof Error)) return false

  const candidate: Partial<AppError> = err

  return (
    typeof candidate.code === "string" &&
    typeof candidate.context === "object" &&
    candidate.context !== null &&
    typeof candidate.isOperational === "boolean" &&
    candidate.timestamp instanceof Date
  )
}
