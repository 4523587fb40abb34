import type { Logger } from "@repoproxy/logger"
import type { StopResult } from "./shutdown"

export interface SignalHandlerContext {
  logger: Logger
  stop: () => Promise<StopResult>
  /** @default 10_000 */
  fatalTimeoutMs?: number
  /** @default process.exit */
  exit?: (code: number) => void
}

export interface SignalHandler {
  unregister: () => void
}

/**
 * SIGINT/SIGTERM trigger a graceful stop. Uncaught errors trigger a stop
 * followed by exit(1), forced after `fatalTimeoutMs`.
 */
export function setupProcessHandlers(ctx: SignalHandlerContext): SignalHandler {
  const fatalTimeoutMs = ctx.fatalTimeoutMs ?? 10_000
  const exit = ctx.exit ?? ((code: number) => process.exit(code))

  let stopping = false

  const onSignal = (signal: NodeJS.Signals) => {
    ctx.logger.info("Received signal", { signal })

    if (stopping) return
    stopping = true

    ctx.logger.warn("Shutdown triggered", { reason: signal })
    void runStop(ctx, signal)
  }

  const onFatal = (reason: string, err: unknown) => {
    if (stopping) {
      ctx.logger.fatal("Fatal error during shutdown", { reason, err })
      exit(1)
      return
    }

    stopping = true
    ctx.logger.fatal("Fatal error", { reason, err })

    const timer = setTimeout(() => {
      ctx.logger.fatal("Forced exit after timeout", { timeoutMs: fatalTimeoutMs })
      exit(1)
    }, fatalTimeoutMs)
    timer.unref()

    void runStop(ctx, reason).finally(() => {
      clearTimeout(timer)
      exit(1)
    })
  }

  const sigint = () => onSignal("SIGINT")
  const sigterm = () => onSignal("SIGTERM")
  const uncaught = (err: Error) => onFatal("uncaughtException", err)
  const rejection = (reason: unknown) => onFatal("unhandledRejection", reason)

  process.on("SIGINT", sigint)
  process.on("SIGTERM", sigterm)
  process.on("uncaughtException", uncaught)
  process.on("unhandledRejection", rejection)

  return {
    unregister: () => {
      process.off("SIGINT", sigint)
      process.off("SIGTERM", sigterm)
      process.off("uncaughtException", uncaught)
      process.off("unhandledRejection", rejection)
    },
  }
}

export type SetupProcessHandlersFn = typeof setupProcessHandlers

async function runStop(ctx: SignalHandlerContext, reason: string): Promise<void> {
  try {
    const result = await ctx.stop()

    if (!result.ok) {
      ctx.logger.error("Shutdown completed with issues", {
        reason,
        failureCount: result.failures.length,
        timedOut: result.timedOut,
      })
    }
  } catch (err) {
    ctx.logger.error("Shutdown failed", { reason, err })
  }
}
