import type { Clock } from "@repoproxy/clock"
import type { Logger } from "@repoproxy/logger"
import type { AppConfig } from "../../../app/config"
import type { CoreServices } from "../../../app/services/core"
import type { InfraServices } from "../../../app/services/infra"
import { BlobStoreFs } from "../infra/blob-store.fs"
import { CacheIndexPostgres } from "../infra/cache-index.postgres"
import { RepositoryDirectoryPostgres } from "../infra/repository-directory.postgres"
import { RepositoryDirectoryStatic } from "../infra/repository-directory.static"
import { UpstreamClientFetch } from "../infra/upstream-client.fetch"
import type { BlobStore } from "../services/blob-store"
import type { CacheIndex } from "../services/cache-index"
import { FetchAndStorePipeline } from "../services/fetch-and-store"
import { FreshnessValidator } from "../services/freshness-validator"
import { PendingWrites } from "../services/pending-writes"
import { ProxyService } from "../services/proxy-service"
import type { RepositoryDirectory } from "../services/repository-directory"
import { RequestRouter } from "../services/request-router"
import type { UpstreamClient } from "../services/upstream-client"

export type ProxyServices = {
  clock: Clock
  logger: Logger
  proxy: ProxyService
  pendingWrites: PendingWrites
  cacheIndex: CacheIndex
  blobStore: BlobStore
}

/** Adapters to use instead of the ones built from configuration. */
export type ProxyAdapters = {
  cacheIndex?: CacheIndex
  blobStore?: BlobStore
  directory?: RepositoryDirectory
  upstream?: UpstreamClient
}

export function createProxyServices(
  config: AppConfig,
  core: CoreServices,
  infra: InfraServices,
  adapters: ProxyAdapters = {},
): ProxyServices {
  const logger = core.logger.child({ module: "proxy" })

  const cacheIndex = adapters.cacheIndex ?? new CacheIndexPostgres({ pool: infra.pgPool })

  const blobStore = adapters.blobStore ?? new BlobStoreFs({ rootDir: config.cache.dir })

  const directory =
    adapters.directory ??
    (config.proxy.repositories.source === "static"
      ? new RepositoryDirectoryStatic(config.proxy.repositories.entries)
      : new RepositoryDirectoryPostgres({ pool: infra.pgPool }))

  const upstream =
    adapters.upstream ??
    new UpstreamClientFetch(
      {},
      {
        probeTimeoutMs: config.upstream.probeTimeoutMs,
        fetchTimeoutMs: config.upstream.fetchTimeoutMs,
        bodyIdleTimeoutMs: config.upstream.bodyIdleTimeoutMs,
        userAgent: config.upstream.userAgent,
      },
    )

  const pendingWrites = new PendingWrites({ logger })

  const router = new RequestRouter({ directory, logger }, { basePath: config.proxy.basePath })

  const validator = new FreshnessValidator({ upstream, cacheIndex, blobStore, logger })

  const pipeline = new FetchAndStorePipeline(
    { upstream, blobStore, cacheIndex, pendingWrites, clock: core.clock, logger },
    { failOpen: config.cache.failOpen },
  )

  const proxy = new ProxyService({ router, validator, pipeline, blobStore, logger })

  return {
    clock: core.clock,
    logger,
    proxy,
    pendingWrites,
    cacheIndex,
    blobStore,
  }
}
