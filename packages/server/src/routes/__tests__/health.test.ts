import { Hono } from "hono"
import { resolveOptions } from "../../server/server-options"
import type { ReadinessCheck } from "../../server/server-options"
import { registerHealthRoutes } from "../health"

function appWith(ready: boolean, readinessChecks: ReadinessCheck[] = []) {
  const app = new Hono()
  const { health } = resolveOptions({
    port: 5000,
    errors: { mappings: {} },
    routes: () => {},
    health: { enabled: true, readinessChecks, checkTimeoutMs: 50 },
  })

  registerHealthRoutes(app, health, () => ready)

  return app
}

describe("health routes", () => {
  it("answers liveness without caching", async () => {
    const res = await appWith(false).request("/health")

    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({ ok: true })
    expect(res.headers.get("cache-control")).toBe("no-store, no-cache, must-revalidate")
  })

  it("is not ready while starting", async () => {
    const res = await appWith(false).request("/ready")

    expect(res.status).toBe(503)
    expect(await res.json()).toEqual({ ok: false, reason: "starting" })
  })

  it("is ready when every check passes", async () => {
    const res = await appWith(true, [{ name: "postgres", fn: async () => true }]).request(
      "/ready",
    )

    expect(res.status).toBe(200)
  })

  it.each([
    [async () => false, "postgres"],
    [
      async () => {
        throw new Error("ECONNREFUSED")
      },
      "postgres:error",
    ],
    [(signal: AbortSignal) => new Promise<boolean>((resolve) => signal.addEventListener("abort", () => resolve(true))), "postgres:timeout"],
  ])("reports a failing check (%#)", async (fn, reason) => {
    const res = await appWith(true, [{ name: "postgres", fn }]).request("/ready")

    expect(res.status).toBe(503)
    expect(await res.json()).toEqual({ ok: false, reason })
  })
})
