import type { LogBindings, LogMeta } from "./log-context"

export interface Logger {
  trace(message: string, meta?: LogMeta): void
  debug(message: string, meta?: LogMeta): void
  info(message: string, meta?: LogMeta): void
  warn(message: string, meta?: LogMeta): void
  error(message: string, meta?: LogMeta): void
  fatal(message: string, meta?: LogMeta): void

  /**
   * Creates a logger that adds `bindings` to every entry, on top of the
   * parent's own bindings. Used to scope logs to a request or component.
   */
  child(bindings: LogBindings): Logger
}
