import { BaseError } from "@repoproxy/errors"
import { type CacheKey, cacheKeyToString } from "./cache.model"

export type ProxyErrorCode =
  | "repository_not_found"
  | "upstream_unreachable"
  | "upstream_error"
  | "cache_io_error"
  | "metadata_store_error"
  | "stream_error"

export class ProxyError extends BaseError<ProxyErrorCode> {
  static repositoryNotFound(input: { repository?: string; cause?: unknown }): ProxyError {
    return new ProxyError("Repository not found", {
      code: "repository_not_found",
      context: {
        ...(input.repository !== undefined && { repository: input.repository }),
      },
      ...(input.cause !== undefined && { cause: input.cause }),
    })
  }

  static upstreamUnreachable(input: {
    url: string
    method: "HEAD" | "GET"
    cause?: unknown
  }): ProxyError {
    return new ProxyError(`Upstream ${input.method} ${input.url} failed`, {
      code: "upstream_unreachable",
      context: { url: input.url, method: input.method },
      cause: input.cause,
      isRetryable: true,
    })
  }

  static upstreamError(input: {
    url: string
    status: number
    statusText: string
  }): ProxyError {
    return new ProxyError(
      `Upstream answered ${input.status} ${input.statusText}`.trimEnd(),
      {
        code: "upstream_error",
        context: {
          url: input.url,
          status: input.status,
          statusText: input.statusText,
        },
      },
    )
  }

  static cacheIo(input: { key: CacheKey; operation: string; cause?: unknown }): ProxyError {
    return new ProxyError(`Cache ${input.operation} failed for ${cacheKeyToString(input.key)}`, {
      code: "cache_io_error",
      context: { ...input.key, operation: input.operation },
      cause: input.cause,
    })
  }

  static metadataStore(input: {
    key: CacheKey
    operation: string
    cause?: unknown
  }): ProxyError {
    return new ProxyError(
      `Cache index ${input.operation} failed for ${cacheKeyToString(input.key)}`,
      {
        code: "metadata_store_error",
        context: { ...input.key, operation: input.operation },
        cause: input.cause,
        isRetryable: true,
      },
    )
  }

  static stream(input: { key: CacheKey; reason: string; cause?: unknown }): ProxyError {
    return new ProxyError(`Streaming ${cacheKeyToString(input.key)} failed: ${input.reason}`, {
      code: "stream_error",
      context: { ...input.key, reason: input.reason },
      cause: input.cause,
    })
  }
}

export function isProxyError(err: unknown): err is ProxyError {
  return err instanceof ProxyError
}
