import type { Context, MiddlewareHandler } from "hono"
import type { EnabledRequestIdConfig } from "../server/server-options"
import { isNonEmptyString } from "./utils/is-non-empty-string"
import { setHeaderIfMissing } from "./utils/set-header-if-missing"

const TRACE_ID = /^[0-9a-f]{32}$/i
const ZERO_TRACE_ID = /^0{32}$/

function traceIdFromTraceparent(traceparent: string): string | null {
  const parts = traceparent.split("-")
  const traceId = parts.length >= 4 ? parts[1] : undefined

  if (!traceId || !TRACE_ID.test(traceId) || ZERO_TRACE_ID.test(traceId)) return null

  return traceId
}

function resolveRequestId(c: Context, config: Required<EnabledRequestIdConfig>): string {
  const existing = c.get("requestId")
  if (isNonEmptyString(existing)) return existing

  const fromHeader = c.req.header(config.header)
  if (isNonEmptyString(fromHeader)) return fromHeader

  if (config.fallbackToTraceparent) {
    const traceparent = c.req.header("traceparent")
    const traceId = traceparent ? traceIdFromTraceparent(traceparent) : null

    if (traceId) return traceId
  }

  return config.generate()
}

/**
 * Attaches a request id to the context and mirrors it onto the response.
 */
export function requestIdMiddleware(
  config: Required<EnabledRequestIdConfig>,
): MiddlewareHandler {
  const headerName = config.header.toLowerCase()

  return async (c, next) => {
    const requestId = resolveRequestId(c, config)

    c.set("requestId", requestId)

    await next()

    setHeaderIfMissing(c.res.headers, headerName, requestId)
  }
}
