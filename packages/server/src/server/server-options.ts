import { randomUUID } from "node:crypto"
import type { Clock, Milliseconds } from "@repoproxy/clock"
import type { Logger, LogLevelName } from "@repoproxy/logger"
import type { Hono } from "hono"
import type { ErrorMappingsConfig } from "../errors/errors"
import type { LifecycleHook } from "../lifecycle/lifecycle-hook"

export type PathString = `/${string}`

export interface DisabledConfig {
  enabled: false
}

export interface ServerDependencies {
  logger: Logger
  clock: Clock
}

export interface EnabledRequestIdConfig {
  enabled: true

  /** @default "x-request-id" */
  header?: string

  /**
   * Use the trace-id of a W3C `traceparent` header when the request id header
   * is absent.
   * @default false
   */
  fallbackToTraceparent?: boolean

  /** @default crypto.randomUUID */
  generate?: () => string
}

export interface EnabledRequestLoggingConfig {
  enabled: true

  /**
   * Level for completed requests. 5xx responses always log at `error`.
   * @default "info"
   */
  level?: LogLevelName

  /** @default the health paths, when health routes are enabled */
  ignorePaths?: PathString[]
}

export interface ReadinessCheck {
  name: string
  timeoutMs?: Milliseconds
  fn: (signal: AbortSignal) => Promise<boolean>
}

export interface EnabledHealthConfig {
  enabled: true

  /** @default "/health" */
  livenessPath?: PathString

  /** @default "/ready" */
  readinessPath?: PathString

  /** Run on every readiness request, in order; the first failure answers 503. */
  readinessChecks?: ReadinessCheck[]

  /** @default 5_000 */
  checkTimeoutMs?: Milliseconds
}

export interface ClientIpConfig {
  enabled?: boolean

  /**
   * Number of trusted proxies at the end of the X-Forwarded-For chain.
   *
   * XFF "client, proxy1, proxy2" with trustedProxies=1 yields "proxy1".
   * 0 uses the socket address only.
   *
   * @default 0
   */
  trustedProxies?: number
}

export type RequestIdConfig = DisabledConfig | EnabledRequestIdConfig
export type RequestLoggingConfig = DisabledConfig | EnabledRequestLoggingConfig
export type HealthConfig = DisabledConfig | EnabledHealthConfig

export interface ServerOptions {
  port: number

  /** @default "0.0.0.0" */
  host?: string

  /** @default 2_147_483_647 (max timer value) */
  startupTimeoutMs?: Milliseconds

  /** @default 10_000 */
  shutdownTimeoutMs?: Milliseconds

  requestId?: RequestIdConfig
  requestLogging?: RequestLoggingConfig
  health?: HealthConfig
  clientIp?: ClientIpConfig

  errors: ErrorMappingsConfig

  routes: (app: Hono) => void

  startHooks?: LifecycleHook[]
  stopHooks?: LifecycleHook[]
}

export type ResolvedRequestIdConfig = DisabledConfig | Required<EnabledRequestIdConfig>

export type ResolvedRequestLoggingConfig =
  | DisabledConfig
  | Required<EnabledRequestLoggingConfig>

export type ResolvedHealthConfig = DisabledConfig | Required<EnabledHealthConfig>

export type ResolvedClientIpConfig = DisabledConfig | { enabled: true; trustedProxies: number }

export type ResolvedServerOptions = {
  port: number
  host: string
  startupTimeoutMs: Milliseconds
  shutdownTimeoutMs: Milliseconds
  requestId: ResolvedRequestIdConfig
  requestLogging: ResolvedRequestLoggingConfig
  health: ResolvedHealthConfig
  clientIp: ResolvedClientIpConfig
  errors: ErrorMappingsConfig
  routes: (app: Hono) => void
  startHooks: LifecycleHook[]
  stopHooks: LifecycleHook[]
}

const MAX_TIMER_MS: Milliseconds = 2_147_483_647

interface ServerDefaults {
  host: string
  startupTimeoutMs: Milliseconds
  shutdownTimeoutMs: Milliseconds
  requestId: Omit<Required<EnabledRequestIdConfig>, "enabled">
  requestLogging: { level: LogLevelName }
  health: Omit<Required<EnabledHealthConfig>, "enabled" | "readinessChecks">
}

export const DEFAULTS: ServerDefaults = {
  host: "0.0.0.0",
  startupTimeoutMs: MAX_TIMER_MS,
  shutdownTimeoutMs: 10_000,
  requestId: {
    header: "x-request-id",
    fallbackToTraceparent: false,
    generate: () => randomUUID(),
  },
  requestLogging: {
    level: "info",
  },
  health: {
    livenessPath: "/health",
    readinessPath: "/ready",
    checkTimeoutMs: 5_000,
  },
}

export function resolveOptions(options: ServerOptions): ResolvedServerOptions {
  const health = resolveHealthConfig(options)

  return {
    port: options.port,
    host: options.host ?? DEFAULTS.host,
    startupTimeoutMs: options.startupTimeoutMs ?? DEFAULTS.startupTimeoutMs,
    shutdownTimeoutMs: options.shutdownTimeoutMs ?? DEFAULTS.shutdownTimeoutMs,
    requestId: resolveRequestIdConfig(options),
    requestLogging: resolveRequestLoggingConfig(options, health),
    health,
    clientIp: resolveClientIpConfig(options),
    errors: options.errors,
    routes: options.routes,
    startHooks: options.startHooks ?? [],
    stopHooks: options.stopHooks ?? [],
  }
}

function resolveHealthConfig(options: ServerOptions): ResolvedHealthConfig {
  if (options.health?.enabled === false) return { enabled: false }

  return {
    enabled: true,
    livenessPath: options.health?.livenessPath ?? DEFAULTS.health.livenessPath,
    readinessPath: options.health?.readinessPath ?? DEFAULTS.health.readinessPath,
    readinessChecks: options.health?.readinessChecks ?? [],
    checkTimeoutMs: options.health?.checkTimeoutMs ?? DEFAULTS.health.checkTimeoutMs,
  }
}

function resolveRequestIdConfig(options: ServerOptions): ResolvedRequestIdConfig {
  if (options.requestId?.enabled === false) return { enabled: false }

  return {
    enabled: true,
    header: options.requestId?.header ?? DEFAULTS.requestId.header,
    fallbackToTraceparent:
      options.requestId?.fallbackToTraceparent ??
      DEFAULTS.requestId.fallbackToTraceparent,
    generate: options.requestId?.generate ?? DEFAULTS.requestId.generate,
  }
}

function resolveRequestLoggingConfig(
  options: ServerOptions,
  health: ResolvedHealthConfig,
): ResolvedRequestLoggingConfig {
  if (options.requestLogging?.enabled === false) return { enabled: false }

  return {
    enabled: true,
    level: options.requestLogging?.level ?? DEFAULTS.requestLogging.level,
    ignorePaths:
      options.requestLogging?.ignorePaths ??
      (health.enabled ? [health.livenessPath, health.readinessPath] : []),
  }
}

function resolveClientIpConfig(options: ServerOptions): ResolvedClientIpConfig {
  if (options.clientIp?.enabled === false) return { enabled: false }

  return {
    enabled: true,
    trustedProxies: Math.max(0, Math.floor(options.clientIp?.trustedProxies ?? 0)),
  }
}
