import pino, {
  type DestinationStream,
  type Logger as PinoLoggerBase,
  type LoggerOptions as PinoOptions,
} from "pino"
import { errWithCause } from "pino-std-serializers"
import type { LogFields, LogMeta } from "../../ports/log-context"
import type { Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"

export type PinoLoggerDeps = {
  /** Existing pino instance to derive from. Takes precedence over `destination`. */
  base?: PinoLoggerBase
  destination?: DestinationStream
}

export class PinoLogger implements Logger {
  protected readonly logger: PinoLoggerBase

  constructor(
    deps: PinoLoggerDeps = {},
    protected readonly opts: Partial<LoggerOptions> = {},
    context: LogFields = {},
  ) {
    this.logger = (deps.base ?? this.init(deps.destination)).child(context)
  }

  private init(destination?: DestinationStream): PinoLoggerBase {
    const pinoOpts: PinoOptions = {
      ...(this.opts.level && { level: this.opts.level }),
      serializers: { err: errWithCause },
    }

    if (this.opts.prettify) {
      return pino({
        ...pinoOpts,
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss.l",
            ignore: "hostname",
          },
        },
      })
    }

    return destination ? pino(pinoOpts, destination) : pino(pinoOpts)
  }

  trace(message: string, meta: LogMeta = {}): void {
    this.logger.trace(meta, message)
  }

  debug(message: string, meta: LogMeta = {}): void {
    this.logger.debug(meta, message)
  }

  info(message: string, meta: LogMeta = {}): void {
    this.logger.info(meta, message)
  }

  warn(message: string, meta: LogMeta = {}): void {
    this.logger.warn(meta, message)
  }

  error(message: string, meta: LogMeta = {}): void {
    this.logger.error(meta, message)
  }

  fatal(message: string, meta: LogMeta = {}): void {
    this.logger.fatal(meta, message)
  }

  child(context: LogFields): Logger {
    return new PinoLogger({ base: this.logger }, this.opts, context)
  }
}
