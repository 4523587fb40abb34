import type { Milliseconds } from "@repoproxy/clock"
import type { Hono } from "hono"
import type { ReadinessCheck, ResolvedHealthConfig } from "../server/server-options"

const NO_CACHE_HEADERS = {
  "Cache-Control": "no-store, no-cache, must-revalidate",
} as const

type CheckResult = { ok: true } | { ok: false; reason: string }

export function registerHealthRoutes(
  app: Hono,
  config: ResolvedHealthConfig,
  isReady: () => boolean,
): void {
  if (!config.enabled) return

  app.get(config.livenessPath, (c) => c.json({ ok: true }, 200, NO_CACHE_HEADERS))

  app.get(config.readinessPath, async (c) => {
    if (!isReady()) {
      return c.json({ ok: false, reason: "starting" }, 503, NO_CACHE_HEADERS)
    }

    for (const check of config.readinessChecks) {
      const res = await runCheckWithTimeout(check, check.timeoutMs ?? config.checkTimeoutMs)

      if (!res.ok) {
        return c.json({ ok: false, reason: res.reason }, 503, NO_CACHE_HEADERS)
      }
    }

    return c.json({ ok: true }, 200, NO_CACHE_HEADERS)
  })
}

async function runCheckWithTimeout(
  check: ReadinessCheck,
  timeoutMs: Milliseconds,
): Promise<CheckResult> {
  const controller = new AbortController()
  const timer = setTimeout(() => controller.abort(), timeoutMs)

  try {
    const ok = await check.fn(controller.signal)

    if (controller.signal.aborted) return { ok: false, reason: `${check.name}:timeout` }

    return ok ? { ok: true } : { ok: false, reason: check.name }
  } catch {
    return {
      ok: false,
      reason: controller.signal.aborted ? `${check.name}:timeout` : `${check.name}:error`,
    }
  } finally {
    clearTimeout(timer)
  }
}
