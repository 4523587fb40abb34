import type { Logger } from "@repoproxy/logger"
import type { ProxyTarget } from "../model/cache.model"
import { ProxyError } from "../model/proxy.errors"
import { respondWithBlob } from "./blob-responder"
import type { BlobReadHandle, BlobStore } from "./blob-store"
import type { FetchAndStorePipeline } from "./fetch-and-store"
import type { FreshnessValidator } from "./freshness-validator"
import type { RequestRouter } from "./request-router"

export type ProxyServiceDeps = {
  router: RequestRouter
  validator: FreshnessValidator
  pipeline: FetchAndStorePipeline
  blobStore: BlobStore
  logger: Logger
}

export type ProxyRequest = {
  /** Raw, still percent-encoded request path. */
  pathname: string
  headers: Headers
  clientIp?: string
  logger?: Logger
}

export class ProxyService {
  constructor(private readonly deps: ProxyServiceDeps) {}

  async handle(request: ProxyRequest): Promise<Response> {
    const logger = request.logger ?? this.deps.logger

    const target = await this.deps.router.resolve(request.pathname, logger)
    const freshness = await this.deps.validator.validate(target, logger)

    const meta = {
      ...(request.clientIp !== undefined && { clientIp: request.clientIp }),
      repository: target.key.repository,
      path: target.key.path,
    }

    if (freshness.kind === "hit") {
      const handle = await this.openBlob(target, logger)

      if (handle) {
        logger.info("Cache hit", meta)

        return respondWithBlob(handle, target.key, request.headers)
      }
    }

    logger.info("Cache miss", {
      ...meta,
      reason: freshness.kind === "miss" ? freshness.reason : "blob_missing",
    })

    return this.deps.pipeline.run(target, freshness.probe, logger)
  }

  private async openBlob(target: ProxyTarget, logger: Logger): Promise<BlobReadHandle | null> {
    try {
      return await this.deps.blobStore.openForRead(target.key)
    } catch (err) {
      logger.warn("Cache blob open failed, treating as miss", {
        err: ProxyError.cacheIo({ key: target.key, operation: "open", cause: err }),
        repository: target.key.repository,
      })

      return null
    }
  }
}
