import { serve } from "@hono/node-server"
import type { Logger } from "@repoproxy/logger"
import type { Hono } from "hono"
import type { ResolvedServerOptions } from "../server/server-options"
import type { Closeable } from "./shutdown"

export function listen(app: Hono, options: ResolvedServerOptions, logger: Logger): Closeable {
  const server = serve({
    fetch: app.fetch,
    port: options.port,
    hostname: options.host,
  })

  logger.info(`Server listening on http://${options.host}:${options.port}`)

  return server
}

export type ListenFn = typeof listen
