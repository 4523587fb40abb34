import type { CacheDescriptor, CacheKey } from "../model/cache.model"

/** Writes available while a key lock is held. */
export interface CacheIndexWriter {
  upsert(key: CacheKey, descriptor: CacheDescriptor): Promise<void>
}

/**
 * Durable map from a cache key to the descriptor of the last published copy.
 * A descriptor does not imply that the blob exists.
 */
export interface CacheIndex extends CacheIndexWriter {
  get(key: CacheKey): Promise<CacheDescriptor | null>

  /** Inserts the first descriptor for a key, overwrites it afterwards. */
  upsert(key: CacheKey, descriptor: CacheDescriptor): Promise<void>

  /**
   * Runs `fn` while holding an exclusive lock on `key`. Writes made through
   * the writer `fn` receives share the lock's connection.
   */
  withKeyLock<T>(key: CacheKey, fn: (tx: CacheIndexWriter) => Promise<T>): Promise<T>
}
