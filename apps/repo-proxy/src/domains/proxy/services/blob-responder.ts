import { getMimeType } from "hono/utils/mime"
import { type CacheKey, DEFAULT_CONTENT_TYPE } from "../model/cache.model"
import type { BlobReadHandle } from "./blob-store"
import { CACHE_STATUS_HEADER } from "./fetch-and-store"

/**
 * Serve a cached blob. Answers 304 without a body when `If-Modified-Since` is
 * not older than the blob's mtime (second precision).
 */
export async function respondWithBlob(
  handle: BlobReadHandle,
  key: CacheKey,
  requestHeaders: Headers,
): Promise<Response> {
  const lastModified = handle.modifiedAt.toUTCString()

  if (notModifiedSince(handle.modifiedAt, requestHeaders.get("if-modified-since"))) {
    await handle.close()

    return new Response(null, {
      status: 304,
      headers: { "Last-Modified": lastModified, [CACHE_STATUS_HEADER]: "HIT" },
    })
  }

  return new Response(handle.stream(), {
    status: 200,
    headers: {
      "Content-Type": contentTypeFor(key.path),
      "Content-Length": String(handle.size),
      "Last-Modified": lastModified,
      [CACHE_STATUS_HEADER]: "HIT",
    },
  })
}

export function contentTypeFor(path: string): string {
  const file = path.slice(path.lastIndexOf("/") + 1)

  return getMimeType(file) ?? DEFAULT_CONTENT_TYPE
}

function notModifiedSince(modifiedAt: Date, header: string | null): boolean {
  if (header === null) return false

  const since = Date.parse(header)
  if (Number.isNaN(since)) return false

  return Math.floor(modifiedAt.getTime() / 1000) * 1000 <= since
}
