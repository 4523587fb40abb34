import type { Clock, UnixMs } from "@repoproxy/clock"
import type { Logger } from "@repoproxy/logger"
import type { HookFailure, LifecycleHook } from "./lifecycle-hook"
import { runHooks } from "./run-hooks"

export interface Closeable {
  close: (callback?: (err?: Error) => void) => void
}

export type ShutdownContext = {
  server: Closeable
  clock: Clock
  logger: Logger
  deadlineMs: UnixMs
  stopHooks: LifecycleHook[]
}

export type StopResult = {
  /** No failures and no timeout. */
  ok: boolean
  failures: HookFailure[]

  /**
   * The deadline passed before every hook finished. Open sockets are not
   * force-closed.
   */
  timedOut: boolean
}

/** Stops accepting connections, then runs stop hooks in order. */
export async function shutdown(ctx: ShutdownContext): Promise<StopResult> {
  ctx.logger.warn("Shutting down gracefully")

  const { failures, timedOut } = await runHooks(
    {
      phase: "shutdown",
      clock: ctx.clock,
      logger: ctx.logger,
      deadlineMs: ctx.deadlineMs,
    },
    [closeServerHook(ctx.server), ...ctx.stopHooks],
    { failFast: false },
  )

  ctx.logger.info("Shutdown complete", { failures: failures.length, timedOut })

  return { ok: failures.length === 0 && !timedOut, failures, timedOut }
}

export type ShutdownFn = typeof shutdown

function closeServerHook(server: Closeable): LifecycleHook {
  return {
    name: "server.close",
    fn: async ({ signal }) => {
      const res = await closeUntilAborted(server, signal)

      if (!res.aborted && res.error) throw res.error
    },
  }
}

type CloseResult = { aborted: true } | { aborted: false; error?: Error }

function closeUntilAborted(server: Closeable, signal: AbortSignal): Promise<CloseResult> {
  if (signal.aborted) return Promise.resolve({ aborted: true })

  return new Promise((resolve) => {
    const onAbort = () => resolve({ aborted: true })

    signal.addEventListener("abort", onAbort, { once: true })

    server.close((err) => {
      signal.removeEventListener("abort", onAbort)
      resolve(err ? { aborted: false, error: err } : { aborted: false })
    })
  })
}
