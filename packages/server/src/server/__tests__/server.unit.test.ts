import { FakeClock } from "@repoproxy/clock"
import type { Logger } from "@repoproxy/logger"
import type { ErrorHandler } from "hono"
import type { Mock } from "vitest"
import { type MockProxy, mock } from "vitest-mock-extended"
import type { BuildAppContext } from "../../lifecycle/build-app"
import type { StopResult } from "../../lifecycle/shutdown"
import { Server, type ServerCollaborators, StartupError } from "../server"
import { resolveOptions, type ServerDependencies } from "../server-options"

const OK: StopResult = { ok: true, failures: [], timedOut: false }

describe("Server", () => {
  let logger: MockProxy<Logger>
  let deps: ServerDependencies
  let collabs: ServerCollaborators
  let stop: Mock<() => Promise<StopResult>>
  let unregister: Mock<() => void>

  const options = () =>
    resolveOptions({
      port: 5000,
      errors: { mappings: {} },
      routes: () => {},
      startHooks: [{ name: "start:test", fn: async () => {} }],
    })

  beforeEach(() => {
    logger = mock<Logger>()
    deps = { logger, clock: new FakeClock(0) }
    stop = vi.fn(async () => OK)
    unregister = vi.fn()

    collabs = {
      onStartup: vi.fn(async () => ({ ok: true, failures: [], timedOut: false })),
      onShutdown: vi.fn(async () => OK),
      listen: vi.fn(() => ({ close: (cb?: (err?: Error) => void) => cb?.() })),
      buildApp: vi.fn((ctx: BuildAppContext) => ctx.app),
      createStopper: vi.fn(() => ({ stop, address: { host: "0.0.0.0", port: 5000 } })),
      createDefaultMiddleware: vi.fn(() => []),
      createErrorHandler: vi.fn((): ErrorHandler => (_err, c) => c.text("error", 500)),
      setupProcessHandlers: vi.fn(() => ({ unregister })),
    }
  })

  function createServer(): Server {
    return new Server(deps, options(), collabs)
  }

  describe("build", () => {
    it("starts idle and unbuilt", () => {
      const server = createServer()

      expect(server.getState()).toBe("idle")
      expect(server.isReady()).toBe(false)
      expect(server.isBuilt()).toBe(false)
    })

    it("is idempotent and returns this", () => {
      const server = createServer()

      expect(server.build()).toBe(server)
      server.build()

      expect(collabs.buildApp).toHaveBeenCalledTimes(1)
      expect(server.isBuilt()).toBe(true)
    })

    it("hands the server's app and a live readiness accessor to buildApp", () => {
      const server = createServer()

      server.build()

      const ctx = vi.mocked(collabs.buildApp).mock.calls[0]?.[0]
      expect(ctx?.app).toBe(server.app)
      expect(ctx?.isReady()).toBe(false)
    })
  })

  describe("start", () => {
    it("runs startup, builds, listens and becomes ready", async () => {
      const server = createServer()

      const handle = await server.start()

      expect(collabs.onStartup).toHaveBeenCalledTimes(1)
      expect(collabs.listen).toHaveBeenCalledWith(server.app, expect.anything(), logger)
      expect(handle.address).toEqual({ host: "0.0.0.0", port: 5000 })
      expect(server.getState()).toBe("started")
      expect(server.isReady()).toBe(true)
      expect(server.isBuilt()).toBe(true)
    })

    it("passes a deadline derived from the startup timeout", async () => {
      const server = createServer()

      await server.start()

      expect(collabs.onStartup).toHaveBeenCalledWith(
        expect.objectContaining({ deadlineMs: 2_147_483_647 }),
      )
    })

    it("refuses to start twice", async () => {
      const server = createServer()
      await server.start()

      await expect(server.start()).rejects.toBeInstanceOf(StartupError)
    })

    it("fails without listening when a start hook fails", async () => {
      const cause = new Error("db down")
      vi.mocked(collabs.onStartup).mockResolvedValue({
        ok: false,
        failures: [{ hook: "start:postgres", error: cause }],
        timedOut: false,
      })
      const server = createServer()

      const err = await server.start().catch((e: unknown) => e)

      expect(err).toBeInstanceOf(StartupError)
      expect(err).toMatchObject({
        context: { failedHooks: ["start:postgres"], timedOut: false },
        cause,
      })
      expect(collabs.listen).not.toHaveBeenCalled()
      expect(server.getState()).toBe("idle")
    })
  })

  describe("process handlers", () => {
    it("registers once", () => {
      const server = createServer()

      server.setupProcessHandlers().setupProcessHandlers()

      expect(collabs.setupProcessHandlers).toHaveBeenCalledTimes(1)
    })

    it("stops the running server when signalled", async () => {
      const server = createServer()
      server.setupProcessHandlers()
      await server.start()

      const ctx = vi.mocked(collabs.setupProcessHandlers).mock.calls[0]?.[0]
      await ctx?.stop()

      expect(stop).toHaveBeenCalledTimes(1)
    })

    it("answers a stop before start without failing", async () => {
      const server = createServer()
      server.setupProcessHandlers()

      const ctx = vi.mocked(collabs.setupProcessHandlers).mock.calls[0]?.[0]

      await expect(ctx?.stop()).resolves.toEqual(OK)
      expect(logger.warn).toHaveBeenCalledWith("Stop called but server not running")
    })
  })
})
