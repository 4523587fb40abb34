import { BaseError } from "@repoproxy/errors"
import { type Context, type Handler, Hono, type MiddlewareHandler } from "hono"
import { type CreateErrorHandlerFn, createErrorHandler } from "../errors/create-error-handler"
import { type BuildAppFn, buildApp } from "../lifecycle/build-app"
import {
  type CreateStopperFn,
  createStopper,
  type ServerHandle,
} from "../lifecycle/create-stopper"
import { type ListenFn, listen } from "../lifecycle/listen"
import { type ShutdownFn, type StopResult, shutdown } from "../lifecycle/shutdown"
import {
  type SetupProcessHandlersFn,
  type SignalHandler,
  setupProcessHandlers,
} from "../lifecycle/signals"
import { type StartupFn, startup } from "../lifecycle/startup"
import {
  type CreateDefaultMiddlewareFn,
  createDefaultMiddleware,
} from "../middleware/create-default-middleware"
import {
  type ResolvedServerOptions,
  resolveOptions,
  type ServerDependencies,
  type ServerOptions,
} from "./server-options"

export type Application = Hono
export type { Context }
export type Middleware = MiddlewareHandler
export type RequestHandler = Handler
export type ServerState = "idle" | "starting" | "started"

export interface ServerCollaborators {
  onStartup: StartupFn
  onShutdown: ShutdownFn
  listen: ListenFn
  buildApp: BuildAppFn
  createStopper: CreateStopperFn
  setupProcessHandlers: SetupProcessHandlersFn
  createDefaultMiddleware: CreateDefaultMiddlewareFn
  createErrorHandler: CreateErrorHandlerFn
}

const defaultCollaborators: ServerCollaborators = {
  onStartup: startup,
  onShutdown: shutdown,
  listen,
  buildApp,
  createStopper,
  setupProcessHandlers,
  createDefaultMiddleware,
  createErrorHandler,
}

export class StartupError extends BaseError<"startup_failed"> {}

export class Server {
  readonly app: Application

  private state: ServerState = "idle"
  private ready = false
  private built = false
  private runningServer?: ServerHandle
  private signalHandler?: SignalHandler

  constructor(
    private readonly deps: ServerDependencies,
    private readonly options: ResolvedServerOptions,
    private readonly collabs: ServerCollaborators = defaultCollaborators,
  ) {
    this.app = new Hono()
  }

  /**
   * Registers health routes, middleware, application routes and the error
   * handler without listening. Idempotent; `start()` calls it.
   */
  build(): this {
    if (this.built) return this

    this.collabs.buildApp({
      app: this.app,
      options: this.options,
      isReady: () => this.ready,
      defaultMiddleware: this.collabs.createDefaultMiddleware(this.options, this.deps.logger),
      errorHandler: this.collabs.createErrorHandler(this.options.errors, this.deps.logger),
    })

    this.built = true

    return this
  }

  setupProcessHandlers(): this {
    if (this.signalHandler) return this

    this.signalHandler = this.collabs.setupProcessHandlers({
      logger: this.deps.logger,
      stop: () => this.runningServer?.stop() ?? this.noopStop(),
    })

    return this
  }

  async start(): Promise<ServerHandle> {
    if (this.state !== "idle") {
      throw new StartupError("Server already started", { code: "startup_failed" })
    }

    this.state = "starting"

    try {
      const result = await this.collabs.onStartup({
        clock: this.deps.clock,
        logger: this.deps.logger,
        deadlineMs: this.deps.clock.nowMs() + this.options.startupTimeoutMs,
        startHooks: this.options.startHooks,
      })

      if (!result.ok) {
        throw new StartupError("Startup hooks failed", {
          code: "startup_failed",
          context: {
            failedHooks: result.failures.map((f) => f.hook),
            timedOut: result.timedOut,
          },
          cause: result.failures[0]?.error,
        })
      }

      this.build()

      const server = this.collabs.listen(this.app, this.options, this.deps.logger)

      const handle = this.collabs.createStopper({
        server,
        deps: this.deps,
        options: this.options,
        stopHooks: this.options.stopHooks,
        setReady: (v) => {
          this.ready = v
        },
        shutdown: this.collabs.onShutdown,
        onStop: () => this.signalHandler?.unregister(),
      })

      this.runningServer = handle
      this.ready = true
      this.state = "started"

      return handle
    } catch (err) {
      this.state = "idle"
      this.ready = false

      throw err
    }
  }

  getState(): ServerState {
    return this.state
  }

  isReady(): boolean {
    return this.ready
  }

  isBuilt(): boolean {
    return this.built
  }

  private noopStop(): Promise<StopResult> {
    this.deps.logger.warn("Stop called but server not running")

    return Promise.resolve({ ok: true, failures: [], timedOut: false })
  }
}

export function createServer(deps: ServerDependencies, options: ServerOptions): Server {
  return new Server(deps, resolveOptions(options))
}
