import type { Logger } from "@repoproxy/logger"
import type { MiddlewareHandler } from "hono"
import { routePath } from "hono/route"
import type { EnabledRequestLoggingConfig, PathString } from "../server/server-options"
import { isNonEmptyString } from "./utils/is-non-empty-string"

/**
 * Logs one line per completed request.
 *
 * 5xx => error, everything else => `config.level`.
 */
export function requestLoggingMiddleware(
  config: Required<EnabledRequestLoggingConfig>,
  baseLogger: Logger,
): MiddlewareHandler {
  return async (c, next) => {
    const path = c.req.path

    if (shouldIgnore(path, config.ignorePaths)) {
      await next()
      return
    }

    const start = performance.now()

    try {
      await next()
    } finally {
      const status = c.res.status
      const method = c.req.method
      const matched = routePath(c)
      const route = isNonEmptyString(matched) ? matched : path

      const clientIp = c.get("clientIp")
      const userAgent = c.req.header("user-agent")

      const meta = {
        method,
        path,
        route,
        status,
        durationMs: Math.round(performance.now() - start),
        ...(clientIp !== undefined && { clientIp }),
        ...(userAgent !== undefined && { userAgent }),
      }

      const logger = c.get("logger") ?? baseLogger

      if (status >= 500) {
        logger.error("Request completed", meta)
      } else {
        logger[config.level]("Request completed", meta)
      }
    }
  }
}

function shouldIgnore(path: string, ignorePaths: PathString[]): boolean {
  return ignorePaths.some((ignored) => path === ignored || path.startsWith(`${ignored}/`))
}
