import { FakeClock } from "@repoproxy/clock"
import { NullLogger } from "@repoproxy/logger"
import { createStopper } from "../create-stopper"
import { resolveOptions } from "../../server/server-options"
import { type Closeable, shutdown } from "../shutdown"

function closeable(error?: Error): Closeable & { closed: number } {
  return {
    closed: 0,
    close(cb) {
      this.closed++
      cb?.(error)
    },
  }
}

describe("shutdown", () => {
  it("closes the server before running stop hooks", async () => {
    const order: string[] = []
    const server: Closeable = {
      close: (cb) => {
        order.push("server.close")
        cb?.()
      },
    }

    const res = await shutdown({
      server,
      clock: new FakeClock(0),
      logger: new NullLogger(),
      deadlineMs: 10_000,
      stopHooks: [
        { name: "stop:drain", fn: async () => void order.push("stop:drain") },
        { name: "stop:postgres", fn: async () => void order.push("stop:postgres") },
      ],
    })

    expect(order).toEqual(["server.close", "stop:drain", "stop:postgres"])
    expect(res).toEqual({ ok: true, failures: [], timedOut: false })
  })

  it("reports a close error and still runs stop hooks", async () => {
    const error = new Error("not running")
    const ran: string[] = []

    const res = await shutdown({
      server: closeable(error),
      clock: new FakeClock(0),
      logger: new NullLogger(),
      deadlineMs: 10_000,
      stopHooks: [{ name: "stop:postgres", fn: async () => void ran.push("stop:postgres") }],
    })

    expect(ran).toEqual(["stop:postgres"])
    expect(res).toEqual({ ok: false, failures: [{ hook: "server.close", error }], timedOut: false })
  })
})

describe("createStopper", () => {
  it("shuts down once however often stop is called", async () => {
    const server = closeable()
    const setReady = vi.fn()
    const onStop = vi.fn()

    const handle = createStopper({
      server,
      deps: { clock: new FakeClock(0), logger: new NullLogger() },
      options: resolveOptions({ port: 5000, errors: { mappings: {} }, routes: () => {} }),
      stopHooks: [],
      setReady,
      onStop,
      shutdown,
    })

    const [a, b] = await Promise.all([handle.stop(), handle.stop()])

    expect(a).toBe(b)
    expect(server.closed).toBe(1)
    expect(setReady).toHaveBeenCalledWith(false)
    expect(onStop).toHaveBeenCalledTimes(1)
    expect(handle.address).toEqual({ host: "0.0.0.0", port: 5000 })
  })
})
