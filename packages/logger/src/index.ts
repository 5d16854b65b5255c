export { createNullLogger, NullLogger } from "./adapters/null/null-logger"
export { PinoLogger, type PinoLoggerDeps } from "./adapters/pino/pino-logger"
export type { LogContext, LogEvent, LogFields, LogMeta } from "./ports/log-context"
export { isLogLevelName, LOG_LEVELS, type LogLevelName } from "./ports/log-level"
export type { Logger } from "./ports/logger"
export type { LoggerOptions } from "./ports/logger-options"
