import type { Milliseconds } from "@repoproxy/clock"
import { type LogLevelName, logLevelNames } from "@repoproxy/logger"
import { z } from "zod/mini"

export const repositorySources = ["postgres", "static"] as const

export type RepositorySource = (typeof repositorySources)[number]

const pathString = z.templateLiteral(["/", z.string()])

export const envSchema = z.object({
  APP_ENV: z._default(z.string(), "development"),
  SERVICE_NAME: z._default(z.string(), "repo-proxy"),
  SERVER_HOST: z._default(z.string(), "0.0.0.0"),

  SERVER_PORT: z._default(z.coerce.number(), 5000),
  SERVER_SHUTDOWN_TIMEOUT_MS: z._default(z.coerce.number(), 10_000),
  SERVER_LIVENESS_PATH: z._default(pathString, "/health"),
  SERVER_READINESS_PATH: z._default(pathString, "/ready"),

  LOG_LEVEL: z._default(z.enum(logLevelNames), "info"),
  LOG_PRETTY: z._default(z.stringbool(), false),

  REQUEST_ID_ENABLED: z._default(z.stringbool(), true),
  REQUEST_ID_HEADER: z._default(z.string(), "x-request-id"),
  REQUEST_ID_FALLBACK_TO_TRACEPARENT: z._default(z.stringbool(), false),

  REQUEST_LOGGING_ENABLED: z._default(z.stringbool(), true),
  REQUEST_LOGGING_LEVEL: z._default(z.enum(logLevelNames), "info"),

  CLIENT_IP_ENABLED: z._default(z.stringbool(), true),
  CLIENT_IP_TRUSTED_PROXIES: z._default(z.coerce.number(), 0),

  DATABASE_URL: z._default(z.string(), "postgres://localhost:5432/repoproxy"),
  DATABASE_POOL_MAX: z._default(z.coerce.number(), 10),
  DATABASE_MIGRATE: z._default(z.stringbool(), false),

  CACHE_DIR: z._default(z.string(), "/cache"),
  CACHE_FAIL_OPEN: z._default(z.stringbool(), true),

  PROXY_BASE_PATH: z._default(pathString, "/"),

  REPOSITORY_SOURCE: z._default(z.enum(repositorySources), "postgres"),
  REPOSITORIES: z._default(z.string(), ""),

  UPSTREAM_PROBE_TIMEOUT_MS: z._default(z.coerce.number(), 10_000),
  UPSTREAM_FETCH_TIMEOUT_MS: z._default(z.coerce.number(), 30_000),
  UPSTREAM_BODY_IDLE_TIMEOUT_MS: z._default(z.coerce.number(), 30_000),
  UPSTREAM_USER_AGENT: z._default(z.string(), "repo-proxy"),
})

export type EnvConfig = z.infer<typeof envSchema>

export type AppConfig = {
  app: {
    env: string
  }

  server: {
    host: string
    port: number
    shutdownTimeoutMs: Milliseconds
    livenessPath: `/${string}`
    readinessPath: `/${string}`
  }

  logging: {
    level: LogLevelName
    prettify: boolean
    serviceName: string
  }

  requestId: {
    enabled: boolean
    header: string
    fallbackToTraceparent: boolean
  }

  requestLogging: {
    enabled: boolean
    level: LogLevelName
  }

  clientIp: {
    enabled: boolean
    trustedProxies: number
  }

  database: {
    url: string
    poolMax: number
    migrate: boolean
  }

  cache: {
    dir: string
    failOpen: boolean
  }

  proxy: {
    basePath: `/${string}`
    repositories: {
      source: RepositorySource
      /** Name to upstream base URL; used when `source` is "static". */
      entries: Record<string, string>
    }
  }

  upstream: {
    probeTimeoutMs: Milliseconds
    fetchTimeoutMs: Milliseconds
    bodyIdleTimeoutMs: Milliseconds
    userAgent: string
  }
}
