import type { CacheKey } from "../model/cache.model"

export interface BlobReadHandle {
  size: number
  modifiedAt: Date
  /** Streams the file and closes it once drained or cancelled. */
  stream(): ReadableStream<Uint8Array>
  /** Releases the handle without reading it. */
  close(): Promise<void>
}

/**
 * Bytes written to a temporary location; nothing is visible under the key
 * until `commit()`.
 */
export interface BlobWriter {
  readonly bytesWritten: number
  write(chunk: Uint8Array): Promise<void>
  /** Atomically replaces the blob at the key with the written bytes. */
  commit(): Promise<void>
  /** Discards the temporary bytes. Safe to call after `commit()`. */
  abort(): Promise<void>
}

export interface BlobStore {
  exists(key: CacheKey): Promise<boolean>
  /** Resolves `null` when no blob exists for the key. */
  openForRead(key: CacheKey): Promise<BlobReadHandle | null>
  openForWrite(key: CacheKey): Promise<BlobWriter>
}
