import type { LifecycleHook } from "./lifecycle-hook"
import type { ResolvedServerOptions, ServerDependencies } from "../server/server-options"
import type { Closeable, ShutdownFn, StopResult } from "./shutdown"

export interface ServerHandle {
  /** Idempotent; every call resolves with the same result. */
  stop(): Promise<StopResult>
  address: { host: string; port: number }
}

export interface RunningServerContext {
  server: Closeable
  deps: ServerDependencies
  options: ResolvedServerOptions
  stopHooks: LifecycleHook[]
  setReady: (value: boolean) => void
  onStop: () => void
  shutdown: ShutdownFn
}

export function createStopper(ctx: RunningServerContext): ServerHandle {
  let stopping: Promise<StopResult> | undefined

  return {
    stop: () => {
      stopping ??= runShutdown(ctx)

      return stopping
    },
    address: {
      host: ctx.options.host,
      port: ctx.options.port,
    },
  }
}

export type CreateStopperFn = typeof createStopper

async function runShutdown(ctx: RunningServerContext): Promise<StopResult> {
  ctx.setReady(false)

  try {
    return await ctx.shutdown({
      server: ctx.server,
      clock: ctx.deps.clock,
      logger: ctx.deps.logger,
      deadlineMs: ctx.deps.clock.nowMs() + ctx.options.shutdownTimeoutMs,
      stopHooks: ctx.stopHooks,
    })
  } finally {
    ctx.onStop()
  }
}
