import type { ErrorHandler, Hono, MiddlewareHandler } from "hono"
import { registerHealthRoutes } from "../routes/health"
import type { ResolvedServerOptions } from "../server/server-options"

export interface BuildAppContext {
  app: Hono
  options: ResolvedServerOptions
  isReady: () => boolean
  defaultMiddleware: MiddlewareHandler[]
  errorHandler: ErrorHandler
}

/** Health routes are registered ahead of the middleware, so probes bypass it. */
export function buildApp(ctx: BuildAppContext): Hono {
  const { app, options } = ctx

  registerHealthRoutes(app, options.health, ctx.isReady)

  for (const mw of ctx.defaultMiddleware) app.use("*", mw)

  options.routes(app)

  app.onError(ctx.errorHandler)

  return app
}

export type BuildAppFn = typeof buildApp
