import { type AppError, type ErrorCode, isAppError } from "@repoproxy/errors"
import type { StatusCode } from "../http/status-codes"

export type ErrorMapping = {
  /** Fixed status, or derived from the error (e.g. an upstream status it carries). */
  status: StatusCode | ((error: AppError) => StatusCode)

  /**
   * User-facing message. Must not expose internals.
   */
  message: string | ((error: AppError) => string)
}

export type FallbackMapping = {
  code: ErrorCode
  status: StatusCode
  message: string
}

export interface ErrorMappingsConfig {
  /**
   * Error code to status/message.
   * Unmapped AppErrors keep their code but take the fallback status and message.
   */
  mappings: Partial<Record<ErrorCode, ErrorMapping>>

  /** For unmapped codes and for values that are not AppErrors. */
  fallback?: FallbackMapping
}

export type ErrorResponseBody = {
  status: StatusCode
  code: ErrorCode
  message: string
  requestId: string
}

export type ErrorResponse = {
  error: ErrorResponseBody
}

export type ErrorFormatter = (error: unknown, requestId: string) => ErrorResponse

const DEFAULT_FALLBACK: FallbackMapping = {
  code: "internal_error",
  status: 500,
  message: "An unexpected error occurred",
}

export function createErrorFormatter(config: ErrorMappingsConfig): ErrorFormatter {
  const fallback = config.fallback ?? DEFAULT_FALLBACK

  return (error, requestId) => {
    if (!isAppError(error)) {
      return {
        error: {
          code: fallback.code,
          status: fallback.status,
          message: fallback.message,
          requestId,
        },
      }
    }

    const mapping = config.mappings[error.code]

    return {
      error: {
        code: error.code,
        status: mapping ? resolveStatus(mapping, error) : fallback.status,
        message: mapping ? resolveMessage(mapping, error) : fallback.message,
        requestId,
      },
    }
  }
}

function resolveStatus(mapping: ErrorMapping, error: AppError): StatusCode {
  return typeof mapping.status === "function" ? mapping.status(error) : mapping.status
}

function resolveMessage(mapping: ErrorMapping, error: AppError): string {
  return typeof mapping.message === "function" ? mapping.message(error) : mapping.message
}
