import {
  type Application,
  createServer,
  isErrorStatus,
  type LifecycleHook,
  type ReadinessCheck,
  type Server,
} from "@repoproxy/server"
import type { AppContext } from "../app/create-context"
import { usesPostgres } from "../app/lifecycle"

export type BuiltServer = {
  app: Application
  server: Server
  startHooks: LifecycleHook[]
  stopHooks: LifecycleHook[]
}

export function buildServer(ctx: AppContext): BuiltServer {
  const startHooks = ctx.createStartHooks(ctx)
  const stopHooks = ctx.createStopHooks(ctx)

  const readinessChecks: ReadinessCheck[] = usesPostgres(ctx)
    ? [
        {
          name: "postgres",
          fn: async () => {
            await ctx.services.pgPool.query("select 1")
            return true
          },
        },
      ]
    : []

  const server = createServer(
    {
      clock: ctx.services.clock,
      logger: ctx.services.logger,
    },
    {
      host: ctx.config.server.host,
      port: ctx.config.server.port,
      shutdownTimeoutMs: ctx.config.server.shutdownTimeoutMs,

      errors: {
        mappings: {
          repository_not_found: { status: 404, message: "NOT FOUND" },
          upstream_unreachable: { status: 500, message: "FETCH ERROR" },
          upstream_error: {
            status: (err) => {
              const status = err.context.status
              return typeof status === "number" && isErrorStatus(status) ? status : 502
            },
            message: (err) => {
              const { status, statusText } = err.context
              return `UPSTREAM ERROR ${String(status)} ${String(statusText ?? "")}`.trimEnd()
            },
          },
          cache_io_error: { status: 500, message: "CACHE CREATE ERROR" },
          metadata_store_error: { status: 500, message: "CACHE INDEX ERROR" },
          stream_error: { status: 500, message: "STREAM ERROR" },
        },
      },

      health: {
        enabled: true,
        livenessPath: ctx.config.server.livenessPath,
        readinessPath: ctx.config.server.readinessPath,
        readinessChecks,
      },

      requestId: ctx.config.requestId.enabled
        ? {
            enabled: true,
            header: ctx.config.requestId.header,
            fallbackToTraceparent: ctx.config.requestId.fallbackToTraceparent,
          }
        : { enabled: false },

      requestLogging: ctx.config.requestLogging.enabled
        ? { enabled: true, level: ctx.config.requestLogging.level }
        : { enabled: false },

      clientIp: {
        enabled: ctx.config.clientIp.enabled,
        trustedProxies: ctx.config.clientIp.trustedProxies,
      },

      routes: (app: Application): void => {
        ctx.registerRoutes(app, ctx.config, ctx.services)
      },

      startHooks,
      stopHooks,
    },
  )

  return {
    app: server.app,
    server,
    startHooks,
    stopHooks,
  }
}
