import pino, {
  type DestinationStream,
  type Logger as PinoBase,
  type LoggerOptions as PinoOptions,
} from "pino"
import { errWithCause } from "pino-std-serializers"
import type { LogBindings, LogMeta } from "../../ports/log-context"
import type { Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"

export type PinoLoggerDeps = {
  /** Raw sink; ignored when `prettify` routes output through pino-pretty. */
  destination?: DestinationStream
}

export class PinoLogger implements Logger {
  private readonly logger: PinoBase

  constructor(
    deps: PinoLoggerDeps = {},
    opts: Partial<LoggerOptions> = {},
    bindings: LogBindings = {},
    base?: PinoBase,
  ) {
    this.logger = base ? base.child(bindings) : createBase(deps, opts).child(bindings)
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

  child(bindings: LogBindings): Logger {
    return new PinoLogger({}, {}, bindings, this.logger)
  }
}

function createBase(deps: PinoLoggerDeps, opts: Partial<LoggerOptions>): PinoBase {
  const pinoOpts: PinoOptions = {
    ...(opts.level && { level: opts.level }),
    serializers: { err: errWithCause },
  }

  if (opts.prettify) {
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

  return deps.destination ? pino(pinoOpts, deps.destination) : pino(pinoOpts)
}

export function createPinoLogger(
  deps: PinoLoggerDeps = {},
  opts: Partial<LoggerOptions> = {},
  bindings: LogBindings = {},
): Logger {
  return new PinoLogger(deps, opts, bindings)
}
