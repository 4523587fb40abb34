import {
  type ConfigSource,
  ConfigValidationError,
  DotenvSource,
  EnvSource,
  loadConfig,
} from "@repoproxy/config"
import { type AppConfig, type EnvConfig, envSchema } from "./schema"

export function mapEnvToConfig(env: EnvConfig): AppConfig {
  return {
    app: {
      env: env.APP_ENV,
    },
    server: {
      host: env.SERVER_HOST,
      port: env.SERVER_PORT,
      shutdownTimeoutMs: env.SERVER_SHUTDOWN_TIMEOUT_MS,
      livenessPath: env.SERVER_LIVENESS_PATH,
      readinessPath: env.SERVER_READINESS_PATH,
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
      serviceName: env.SERVICE_NAME,
    },
    requestId: {
      enabled: env.REQUEST_ID_ENABLED,
      header: env.REQUEST_ID_HEADER,
      fallbackToTraceparent: env.REQUEST_ID_FALLBACK_TO_TRACEPARENT,
    },
    requestLogging: {
      enabled: env.REQUEST_LOGGING_ENABLED,
      level: env.REQUEST_LOGGING_LEVEL,
    },
    clientIp: {
      enabled: env.CLIENT_IP_ENABLED,
      trustedProxies: env.CLIENT_IP_TRUSTED_PROXIES,
    },
    database: {
      url: env.DATABASE_URL,
      poolMax: env.DATABASE_POOL_MAX,
      migrate: env.DATABASE_MIGRATE,
    },
    cache: {
      dir: env.CACHE_DIR,
      failOpen: env.CACHE_FAIL_OPEN,
    },
    proxy: {
      basePath: env.PROXY_BASE_PATH,
      repositories: {
        source: env.REPOSITORY_SOURCE,
        entries: parseRepositoryList(env.REPOSITORIES),
      },
    },
    upstream: {
      probeTimeoutMs: env.UPSTREAM_PROBE_TIMEOUT_MS,
      fetchTimeoutMs: env.UPSTREAM_FETCH_TIMEOUT_MS,
      bodyIdleTimeoutMs: env.UPSTREAM_BODY_IDLE_TIMEOUT_MS,
      userAgent: env.UPSTREAM_USER_AGENT,
    },
  }
}

/**
 * Parse `name=url,name=url`. Blank entries are ignored.
 */
export function parseRepositoryList(raw: string): Record<string, string> {
  const entries: Record<string, string> = {}

  for (const entry of raw.split(",")) {
    const trimmed = entry.trim()
    if (trimmed === "") continue

    const eq = trimmed.indexOf("=")
    const name = eq > 0 ? trimmed.slice(0, eq).trim() : ""
    const url = eq > 0 ? trimmed.slice(eq + 1).trim() : ""

    if (name === "" || !URL.canParse(url)) {
      throw new ConfigValidationError(
        `REPOSITORIES: invalid entry "${trimmed}", expected name=url`,
      )
    }

    entries[name] = url
  }

  return entries
}

export async function loadAppConfig(
  env: NodeJS.ProcessEnv,
  cwd: string = process.cwd(),
): Promise<AppConfig> {
  const nodeEnv = env.NODE_ENV ?? "development"

  const sources: ConfigSource[] = [
    new DotenvSource({ file: `.env.${nodeEnv}`, required: false, cwd }),
    new EnvSource({ env }),
  ]

  const result = await loadConfig({
    schema: envSchema,
    sources,
  })

  return mapEnvToConfig(result.value)
}
