import type { Logger } from "@repoproxy/logger"
import {
  type CacheDescriptor,
  fingerprintsMatch,
  type ProxyTarget,
  type UpstreamProbe,
} from "../model/cache.model"
import { ProxyError } from "../model/proxy.errors"
import type { BlobStore } from "./blob-store"
import type { CacheIndex } from "./cache-index"
import type { UpstreamClient } from "./upstream-client"

export type MissReason = "not_indexed" | "index_unavailable" | "changed" | "blob_missing"

export type Freshness =
  | { kind: "hit"; probe: UpstreamProbe; descriptor: CacheDescriptor }
  | { kind: "miss"; probe: UpstreamProbe; reason: MissReason }

export type FreshnessValidatorDeps = {
  upstream: UpstreamClient
  cacheIndex: CacheIndex
  blobStore: BlobStore
  logger: Logger
}

export class FreshnessValidator {
  constructor(private readonly deps: FreshnessValidatorDeps) {}

  /**
   * HIT only when a descriptor exists, matches the probe and the blob is on
   * disk. Probe failures reject; index and blob failures degrade to MISS.
   */
  async validate(target: ProxyTarget, logger: Logger = this.deps.logger): Promise<Freshness> {
    const probe = await this.deps.upstream.probe(target.url)

    let descriptor: CacheDescriptor | null

    try {
      descriptor = await this.deps.cacheIndex.get(target.key)
    } catch (err) {
      logger.warn("Cache index read failed, treating as miss", {
        err: ProxyError.metadataStore({ key: target.key, operation: "read", cause: err }),
        repository: target.key.repository,
      })

      return { kind: "miss", probe, reason: "index_unavailable" }
    }

    if (!descriptor) return { kind: "miss", probe, reason: "not_indexed" }

    if (!fingerprintsMatch(descriptor, probe)) return { kind: "miss", probe, reason: "changed" }

    if (!(await this.blobExists(target, logger))) {
      return { kind: "miss", probe, reason: "blob_missing" }
    }

    return { kind: "hit", probe, descriptor }
  }

  private async blobExists(target: ProxyTarget, logger: Logger): Promise<boolean> {
    try {
      return await this.deps.blobStore.exists(target.key)
    } catch (err) {
      logger.warn("Cache blob check failed, treating as miss", {
        err: ProxyError.cacheIo({ key: target.key, operation: "stat", cause: err }),
        repository: target.key.repository,
      })

      return false
    }
  }
}
