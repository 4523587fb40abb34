import type { Clock } from "@repoproxy/clock"
import type { Logger } from "@repoproxy/logger"
import {
  type CacheDescriptor,
  fingerprintFromHeaders,
  type ProxyTarget,
  type UpstreamProbe,
} from "../model/cache.model"
import { ProxyError } from "../model/proxy.errors"
import type { BlobStore, BlobWriter } from "./blob-store"
import type { CacheIndex } from "./cache-index"
import { ClientChannel } from "./client-channel"
import type { PendingWrites } from "./pending-writes"
import type { UpstreamClient } from "./upstream-client"

export const CACHE_STATUS_HEADER = "X-Cache"

export type FetchAndStoreDeps = {
  upstream: UpstreamClient
  blobStore: BlobStore
  cacheIndex: CacheIndex
  pendingWrites: PendingWrites
  clock: Clock
  logger: Logger
}

export type FetchAndStoreOptions = {
  /**
   * Serve the upstream body uncached when the blob cannot be opened for
   * writing. When false the request fails with `cache_io_error`.
   * @default true
   */
  failOpen?: boolean
}

type CopyOutcome =
  | { kind: "copied"; bytes: number }
  | { kind: "failed"; error: ProxyError }

export class FetchAndStorePipeline {
  private readonly failOpen: boolean

  constructor(
    private readonly deps: FetchAndStoreDeps,
    opts: FetchAndStoreOptions = {},
  ) {
    this.failOpen = opts.failOpen ?? true
  }

  /**
   * Fetches the target and answers with its body while writing the same bytes
   * to the blob store. Persistence continues after the response is returned
   * and is tracked by `PendingWrites`.
   */
  async run(
    target: ProxyTarget,
    probe: UpstreamProbe,
    logger: Logger = this.deps.logger,
  ): Promise<Response> {
    const upstream = await this.deps.upstream.fetch(target.url)

    if (upstream.status >= 400) {
      await discardBody(upstream, logger)

      logger.warn("Upstream rejected request", {
        repository: target.key.repository,
        upstreamStatus: upstream.status,
        url: target.url,
      })

      throw ProxyError.upstreamError({
        url: target.url,
        status: upstream.status,
        statusText: upstream.statusText,
      })
    }

    const headers = responseHeaders(upstream, probe)
    const body = upstream.body ?? emptyBody()

    let writer: BlobWriter

    try {
      writer = await this.deps.blobStore.openForWrite(target.key)
    } catch (err) {
      const error = ProxyError.cacheIo({ key: target.key, operation: "open", cause: err })

      logger.error("Cache write failed", { err: error, repository: target.key.repository })

      if (!this.failOpen) {
        await discardBody(upstream, logger)
        throw error
      }

      return new Response(body, { status: 200, headers })
    }

    const channel = new ClientChannel()

    this.deps.pendingWrites.track(
      this.copyAndPublish({ target, upstream, probe, body, writer, channel, logger }),
    )

    return new Response(channel.stream, { status: 200, headers })
  }

  private async copyAndPublish(input: {
    target: ProxyTarget
    upstream: Response
    probe: UpstreamProbe
    body: ReadableStream<Uint8Array>
    writer: BlobWriter
    channel: ClientChannel
    logger: Logger
  }): Promise<void> {
    const { target, writer, channel, logger } = input

    const outcome = await copyBody(input.body, writer, channel, target, logger)

    if (outcome.kind === "failed") {
      channel.fail(outcome.error)
      await this.discard(writer, target, logger)

      logger.error("Cache write failed", {
        err: outcome.error,
        repository: target.key.repository,
      })

      return
    }

    const declared = declaredLength(input.upstream)

    if (declared !== null && declared !== outcome.bytes) {
      const error = ProxyError.stream({
        key: target.key,
        reason: `received ${outcome.bytes} of ${declared} bytes`,
      })

      channel.fail(error)
      await this.discard(writer, target, logger)

      logger.error("Cache write failed", { err: error, repository: target.key.repository })

      return
    }

    channel.close()

    const descriptor: CacheDescriptor = {
      ...fingerprintFromHeaders(input.upstream.headers, input.probe.fileSize),
      updatedAt: this.deps.clock.now(),
    }

    await this.publish(target, writer, descriptor, logger)
  }

  private async publish(
    target: ProxyTarget,
    writer: BlobWriter,
    descriptor: CacheDescriptor,
    logger: Logger,
  ): Promise<void> {
    try {
      await this.deps.cacheIndex.withKeyLock(target.key, async (tx) => {
        try {
          await writer.commit()
        } catch (err) {
          throw ProxyError.cacheIo({ key: target.key, operation: "publish", cause: err })
        }

        try {
          await tx.upsert(target.key, descriptor)
        } catch (err) {
          throw ProxyError.metadataStore({ key: target.key, operation: "upsert", cause: err })
        }
      })
    } catch (err) {
      const error =
        err instanceof ProxyError
          ? err
          : ProxyError.metadataStore({ key: target.key, operation: "lock", cause: err })

      logger.error("Cache publish failed", { err: error, repository: target.key.repository })

      await this.discard(writer, target, logger)

      return
    }

    logger.info("Cache entry published", {
      repository: target.key.repository,
      path: target.key.path,
      fileSize: descriptor.fileSize,
    })
  }

  private async discard(writer: BlobWriter, target: ProxyTarget, logger: Logger): Promise<void> {
    try {
      await writer.abort()
    } catch (err) {
      logger.warn("Discarding partial cache file failed", {
        err: ProxyError.cacheIo({ key: target.key, operation: "discard", cause: err }),
        repository: target.key.repository,
      })
    }
  }
}

/**
 * Each chunk goes to the blob before the client. A failing sink or source
 * stops the copy; a client that went away does not.
 */
async function copyBody(
  body: ReadableStream<Uint8Array>,
  writer: BlobWriter,
  channel: ClientChannel,
  target: ProxyTarget,
  logger: Logger,
): Promise<CopyOutcome> {
  const reader = body.getReader()
  let bytes = 0

  for (;;) {
    let chunk: ReadableStreamReadResult<Uint8Array>

    try {
      chunk = await reader.read()
    } catch (err) {
      return {
        kind: "failed",
        error: ProxyError.stream({ key: target.key, reason: "upstream read failed", cause: err }),
      }
    }

    if (chunk.done) return { kind: "copied", bytes }

    try {
      await writer.write(chunk.value)
    } catch (err) {
      await reader.cancel(err).catch((cancelErr: unknown) => {
        logger.debug("Cancelling upstream body failed", { err: cancelErr })
      })

      return {
        kind: "failed",
        error: ProxyError.stream({ key: target.key, reason: "cache write failed", cause: err }),
      }
    }

    bytes += chunk.value.byteLength
    await channel.push(chunk.value)
  }
}

function responseHeaders(upstream: Response, probe: UpstreamProbe): Headers {
  const headers = new Headers({
    "Content-Type": probe.contentType,
    [CACHE_STATUS_HEADER]: "MISS",
  })

  const length = declaredLength(upstream)
  if (length !== null) headers.set("Content-Length", String(length))

  return headers
}

/**
 * Body length announced by the upstream, or `null` when absent or when the
 * body arrives content-encoded and the header does not describe the bytes read.
 */
function declaredLength(upstream: Response): number | null {
  const encoding = upstream.headers.get("content-encoding")
  if (encoding !== null && encoding.toLowerCase() !== "identity") return null

  const length = upstream.headers.get("content-length")
  if (length === null || !/^\d+$/.test(length.trim())) return null

  return Number.parseInt(length.trim(), 10)
}

async function discardBody(response: Response, logger: Logger): Promise<void> {
  try {
    await response.body?.cancel()
  } catch (err) {
    logger.debug("Discarding upstream body failed", { err })
  }
}

function emptyBody(): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start: (controller) => {
      controller.close()
    },
  })
}
