import type { AppError, ErrorCode, ErrorContext, SerializedError } from "../ports/error"
import { serializeError } from "./serialize-error"

export type BaseErrorOptions<C extends ErrorCode = ErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  isOperational?: boolean
}>

export class BaseError<C extends ErrorCode = ErrorCode> extends Error implements AppError {
  readonly code: C
  readonly context: ErrorContext
  readonly isOperational: boolean
  readonly timestamp: Date

  constructor(message: string, options: BaseErrorOptions<C>) {
    super(message, { cause: options.cause })

    this.name = this.constructor.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}
