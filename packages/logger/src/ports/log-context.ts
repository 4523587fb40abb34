/** Well-known fields; adapters emit them under these exact names. */
export type LogContext = {
  requestId: string
  service: string
  env: string
  module: string

  method: string
  path: string
  clientIp: string
  status: number
  durationMs: number

  repository: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta = Partial<LogContext> & Partial<LogEvent> & Record<string, unknown>

/** Fields bound to a child logger and repeated on every line it writes. */
export type LogBindings = Partial<LogContext> & Record<string, unknown>
