import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { FakeClock } from "@repoproxy/clock"
import type { Logger } from "@repoproxy/logger"
import { type MockProxy, mock } from "vitest-mock-extended"
import { BlobStoreFs } from "../../infra/blob-store.fs"
import { CacheIndexMemory } from "../../infra/cache-index.memory"
import type { ProxyTarget, UpstreamProbe } from "../../model/cache.model"
import { isProxyError } from "../../model/proxy.errors"
import type { BlobStore, BlobWriter } from "../blob-store"
import { FetchAndStorePipeline } from "../fetch-and-store"
import { PendingWrites } from "../pending-writes"
import type { UpstreamClient } from "../upstream-client"

const target: ProxyTarget = {
  key: { repository: "debian", path: "pool/a.deb" },
  url: "http://mirror.test/debian/pool/a.deb",
}

const probe: UpstreamProbe = {
  lastModified: "Tue, 02 Jan 2024 00:00:00 GMT",
  fileSize: 10,
  etag: '"p"',
  contentType: "application/vnd.debian.binary-package",
}

const encoder = new TextEncoder()

function streamOf(...chunks: string[]): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start: (controller) => {
      for (const chunk of chunks) controller.enqueue(encoder.encode(chunk))
      controller.close()
    },
  })
}

describe("FetchAndStorePipeline", () => {
  let rootDir: string
  let upstream: MockProxy<UpstreamClient>
  let logger: MockProxy<Logger>
  let cacheIndex: CacheIndexMemory
  let blobStore: BlobStoreFs
  let pendingWrites: PendingWrites
  let clock: FakeClock

  const createPipeline = (overrides: { blobStore?: BlobStore; failOpen?: boolean } = {}) =>
    new FetchAndStorePipeline(
      {
        upstream,
        blobStore: overrides.blobStore ?? blobStore,
        cacheIndex,
        pendingWrites,
        clock,
        logger,
      },
      overrides.failOpen === undefined ? {} : { failOpen: overrides.failOpen },
    )

  const blobFile = path.join("debian", "pool", "a.deb")

  beforeEach(async () => {
    rootDir = await fs.mkdtemp(path.join(os.tmpdir(), "fetch-and-store-"))
    upstream = mock<UpstreamClient>()
    logger = mock<Logger>()
    cacheIndex = new CacheIndexMemory()
    blobStore = new BlobStoreFs({ rootDir })
    pendingWrites = new PendingWrites({ logger })
    clock = new FakeClock(Date.UTC(2024, 0, 3))
  })

  afterEach(async () => {
    await fs.rm(rootDir, { recursive: true, force: true })
  })

  it("sends the client the same bytes it stores, chunk by chunk", async () => {
    upstream.fetch.mockResolvedValue(
      new Response(streamOf("hello", " ", "world"), {
        headers: { "content-length": "11", "last-modified": "Wed", etag: 'W/"x"' },
      }),
    )

    const res = await createPipeline().run(target, probe)

    expect(res.status).toBe(200)
    expect(res.headers.get("content-type")).toBe(probe.contentType)
    expect(res.headers.get("content-length")).toBe("11")
    expect(res.headers.get("x-cache")).toBe("MISS")
    expect(await res.text()).toBe("hello world")

    await pendingWrites.drain()

    expect(await fs.readFile(path.join(rootDir, blobFile), "utf-8")).toBe("hello world")
    expect(await cacheIndex.get(target.key)).toEqual({
      lastModified: "Wed",
      fileSize: 11,
      etag: '"x"',
      updatedAt: new Date(Date.UTC(2024, 0, 3)),
    })
    expect(logger.info).toHaveBeenCalledWith("Cache entry published", {
      repository: "debian",
      path: "pool/a.deb",
      fileSize: 11,
    })
  })

  it("falls back to the probe size when the response has no length", async () => {
    upstream.fetch.mockResolvedValue(new Response(streamOf("0123456789")))

    const res = await createPipeline().run(target, probe)

    expect(res.headers.get("content-length")).toBeNull()
    await res.text()
    await pendingWrites.drain()

    expect(await cacheIndex.get(target.key)).toMatchObject({
      lastModified: "",
      fileSize: 10,
      etag: "",
    })
  })

  it("keeps copying to the blob after the client goes away", async () => {
    const chunks = Array.from({ length: 20 }, (_, i) => `chunk-${String(i).padStart(2, "0")};`)
    upstream.fetch.mockResolvedValue(new Response(streamOf(...chunks)))

    const res = await createPipeline().run(target, probe)
    await res.body?.cancel()

    await pendingWrites.drain()

    expect(await fs.readFile(path.join(rootDir, blobFile), "utf-8")).toBe(chunks.join(""))
    expect(await cacheIndex.get(target.key)).not.toBeNull()
  })

  it("propagates upstream error statuses without touching the cache", async () => {
    upstream.fetch.mockResolvedValue(
      new Response("gone", { status: 410, statusText: "Gone" }),
    )

    const err = await createPipeline()
      .run(target, probe)
      .catch((e: unknown) => e)

    expect(isProxyError(err) && err.code).toBe("upstream_error")
    expect(isProxyError(err) && err.context).toMatchObject({ status: 410, statusText: "Gone" })
    expect(pendingWrites.size).toBe(0)
    expect(cacheIndex.size).toBe(0)
    await expect(fs.readdir(rootDir)).resolves.toEqual([])
  })

  it("aborts both sinks when the upstream body fails mid-stream", async () => {
    let sent = false
    const body = new ReadableStream<Uint8Array>({
      pull: (controller) => {
        if (!sent) {
          sent = true
          controller.enqueue(encoder.encode("partial"))
          return
        }
        controller.error(new Error("ECONNRESET"))
      },
    })
    upstream.fetch.mockResolvedValue(new Response(body))

    const res = await createPipeline().run(target, probe)

    await expect(res.text()).rejects.toThrow()
    await pendingWrites.drain()

    expect(cacheIndex.size).toBe(0)
    expect(await fs.readdir(path.join(rootDir, "debian", "pool"))).toEqual([])
    expect(logger.error).toHaveBeenCalledWith("Cache write failed", {
      err: expect.objectContaining({ code: "stream_error" }),
      repository: "debian",
    })
  })

  it("aborts the copy when the blob write fails mid-stream", async () => {
    const open = blobStore.openForWrite.bind(blobStore)
    const writers: BlobWriter[] = []

    vi.spyOn(blobStore, "openForWrite").mockImplementation(async (key) => {
      const writer = await open(key)
      const write = writer.write.bind(writer)
      let calls = 0

      vi.spyOn(writer, "write").mockImplementation(async (chunk) => {
        calls += 1
        if (calls === 2) throw new Error("ENOSPC")
        await write(chunk)
      })
      vi.spyOn(writer, "abort")
      vi.spyOn(writer, "commit")
      writers.push(writer)

      return writer
    })
    upstream.fetch.mockResolvedValue(new Response(streamOf("one", "two", "three")))

    const res = await createPipeline().run(target, probe)

    await expect(res.text()).rejects.toThrow()
    await pendingWrites.drain()

    expect(writers).toHaveLength(1)
    expect(writers[0]?.abort).toHaveBeenCalledTimes(1)
    expect(writers[0]?.commit).not.toHaveBeenCalled()
    expect(cacheIndex.size).toBe(0)
    expect(await fs.readdir(path.join(rootDir, "debian", "pool"))).toEqual([])
    expect(logger.error).toHaveBeenCalledWith("Cache write failed", {
      err: expect.objectContaining({
        code: "stream_error",
        context: expect.objectContaining({ reason: "cache write failed" }),
      }),
      repository: "debian",
    })
  })

  it("does not publish a body shorter than its declared length", async () => {
    upstream.fetch.mockResolvedValue(
      new Response(streamOf("short"), { headers: { "content-length": "50" } }),
    )

    const res = await createPipeline().run(target, probe)

    await expect(res.text()).rejects.toThrow()
    await pendingWrites.drain()

    expect(cacheIndex.size).toBe(0)
    expect(await fs.readdir(path.join(rootDir, "debian", "pool"))).toEqual([])
  })

  describe("when the blob cannot be opened", () => {
    let failingStore: MockProxy<BlobStore>

    beforeEach(() => {
      failingStore = mock<BlobStore>()
      failingStore.openForWrite.mockRejectedValue(new Error("EROFS"))
      upstream.fetch.mockResolvedValue(new Response(streamOf("uncached")))
    })

    it("serves the body uncached by default", async () => {
      const res = await createPipeline({ blobStore: failingStore }).run(target, probe)

      expect(res.status).toBe(200)
      expect(await res.text()).toBe("uncached")
      expect(pendingWrites.size).toBe(0)
      expect(logger.error).toHaveBeenCalledWith("Cache write failed", {
        err: expect.objectContaining({ code: "cache_io_error" }),
        repository: "debian",
      })
    })

    it("fails with cache_io_error when fail-open is off", async () => {
      const err = await createPipeline({ blobStore: failingStore, failOpen: false })
        .run(target, probe)
        .catch((e: unknown) => e)

      expect(isProxyError(err) && err.code).toBe("cache_io_error")
    })
  })

  it("keeps the client response when publishing fails", async () => {
    vi.spyOn(cacheIndex, "upsert").mockRejectedValue(new Error("deadlock detected"))
    upstream.fetch.mockResolvedValue(new Response(streamOf("body")))

    const res = await createPipeline().run(target, probe)

    expect(await res.text()).toBe("body")
    await pendingWrites.drain()

    expect(logger.error).toHaveBeenCalledWith("Cache publish failed", {
      err: expect.objectContaining({ code: "metadata_store_error" }),
      repository: "debian",
    })
    expect(logger.info).not.toHaveBeenCalledWith("Cache entry published", expect.anything())
  })

  it("leaves one descriptor and one complete blob after concurrent misses", async () => {
    upstream.fetch.mockImplementation(async () => new Response(streamOf("same bytes")))
    const pipeline = createPipeline()

    const responses = await Promise.all([
      pipeline.run(target, probe),
      pipeline.run(target, probe),
      pipeline.run(target, probe),
    ])
    const bodies = await Promise.all(responses.map((r) => r.text()))
    await pendingWrites.drain()

    expect(bodies).toEqual(["same bytes", "same bytes", "same bytes"])
    expect(cacheIndex.size).toBe(1)
    expect(await fs.readdir(path.join(rootDir, "debian", "pool"))).toEqual(["a.deb"])
    expect(await fs.readFile(path.join(rootDir, blobFile), "utf-8")).toBe("same bytes")
  })
})
