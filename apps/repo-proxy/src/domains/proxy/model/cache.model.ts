export const MAX_REPOSITORY_NAME_LENGTH = 100

export const DEFAULT_CONTENT_TYPE = "application/octet-stream"

/**
 * Identifies one cached path. `path` is the upstream-relative path exactly as
 * requested, still percent-encoded.
 */
export type CacheKey = {
  repository: string
  path: string
}

/** Freshness fingerprint of a cached path. */
export type Fingerprint = {
  /** Opaque; compared byte for byte. */
  lastModified: string
  fileSize: number
  /** Stored without the weak `W/` prefix. */
  etag: string
}

export type CacheDescriptor = Fingerprint & {
  updatedAt: Date
}

export type UpstreamProbe = Fingerprint & {
  contentType: string
}

export type ProxyTarget = {
  key: CacheKey
  url: string
}

export function cacheKeyToString(key: CacheKey): string {
  return `${key.repository}/${key.path}`
}

export function normalizeEtag(value: string | null | undefined): string {
  if (!value) return ""

  return value.startsWith("W/") ? value.slice(2) : value
}

/** Absent or unparsable lengths read as 0. */
export function parseContentLength(value: string | null | undefined): number {
  if (!value || !/^\d+$/.test(value.trim())) return 0

  const parsed = Number.parseInt(value.trim(), 10)

  return Number.isSafeInteger(parsed) ? parsed : 0
}

export function fingerprintFromHeaders(
  headers: Headers,
  fallbackSize?: number,
): Fingerprint {
  const length = headers.get("content-length")

  return {
    lastModified: headers.get("last-modified") ?? "",
    fileSize:
      length === null && fallbackSize !== undefined
        ? fallbackSize
        : parseContentLength(length),
    etag: normalizeEtag(headers.get("etag")),
  }
}

export function fingerprintsMatch(a: Fingerprint, b: Fingerprint): boolean {
  return (
    a.lastModified === b.lastModified &&
    a.fileSize === b.fileSize &&
    normalizeEtag(a.etag) === normalizeEtag(b.etag)
  )
}
