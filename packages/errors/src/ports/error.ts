export type ErrorCode = Lowercase<string>

/** Structured metadata carried by an error instead of string interpolation. */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode
  readonly context: ErrorContext

  /** `true` if repeating the operation might succeed. */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (unreachable upstream, full disk),
   * `false` for programmer errors and broken invariants.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date
  readonly cause?: unknown
}

/** JSON-safe error shape for logs and transport. */
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
