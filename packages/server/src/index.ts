import "./types/context"

export type {
  ErrorMapping,
  ErrorMappingsConfig,
  ErrorResponse,
  ErrorResponseBody,
} from "./errors/errors"
export { isErrorStatus, type StatusCode } from "./http/status-codes"
export type { ServerHandle } from "./lifecycle/create-stopper"
export type { HookFailure, LifecycleHook, LifecycleHookContext } from "./lifecycle/lifecycle-hook"
export { runHooks } from "./lifecycle/run-hooks"
export type { StopResult } from "./lifecycle/shutdown"
export {
  type Application,
  type Context,
  createServer,
  type Middleware,
  type RequestHandler,
  Server,
  StartupError,
} from "./server/server"
export type {
  ReadinessCheck,
  ServerDependencies,
  ServerOptions,
} from "./server/server-options"
export type { ServerContextVariables } from "./types/context"
