import type { Logger } from "@repoproxy/logger"
import type { MiddlewareHandler } from "hono"
import { isNonEmptyString } from "./utils/is-non-empty-string"

/** Binds a request-scoped child logger to `c.var.logger`. */
export function requestLoggerMiddleware(baseLogger: Logger): MiddlewareHandler {
  return async (c, next) => {
    const requestId = c.get("requestId")

    c.set("logger", baseLogger.child(isNonEmptyString(requestId) ? { requestId } : {}))

    await next()
  }
}
