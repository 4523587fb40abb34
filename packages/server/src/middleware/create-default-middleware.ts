import type { Logger } from "@repoproxy/logger"
import type { MiddlewareHandler } from "hono"
import type { ResolvedServerOptions } from "../server/server-options"
import { clientIpMiddleware } from "./client-ip"
import { requestIdMiddleware } from "./request-id"
import { requestLoggerMiddleware } from "./request-logger"
import { requestLoggingMiddleware } from "./request-logging"

/** Order matters: the request logger binds the id set by `requestIdMiddleware`. */
export function createDefaultMiddleware(
  options: ResolvedServerOptions,
  logger: Logger,
): MiddlewareHandler[] {
  const middleware: MiddlewareHandler[] = []

  if (options.requestId.enabled) {
    middleware.push(requestIdMiddleware(options.requestId))
  }

  if (options.clientIp.enabled) {
    middleware.push(clientIpMiddleware(options.clientIp.trustedProxies))
  }

  middleware.push(requestLoggerMiddleware(logger))

  if (options.requestLogging.enabled) {
    middleware.push(requestLoggingMiddleware(options.requestLogging, logger))
  }

  return middleware
}

export type CreateDefaultMiddlewareFn = typeof createDefaultMiddleware
