import { type CacheDescriptor, type CacheKey, cacheKeyToString } from "../model/cache.model"
import type { CacheIndex, CacheIndexWriter } from "../services/cache-index"

export class CacheIndexMemory implements CacheIndex {
  private readonly entries = new Map<string, CacheDescriptor>()
  private readonly locks = new Map<string, Promise<void>>()

  get size(): number {
    return this.entries.size
  }

  async get(key: CacheKey): Promise<CacheDescriptor | null> {
    const entry = this.entries.get(cacheKeyToString(key))

    return entry ? { ...entry } : null
  }

  async upsert(key: CacheKey, descriptor: CacheDescriptor): Promise<void> {
    this.entries.set(cacheKeyToString(key), { ...descriptor })
  }

  async withKeyLock<T>(key: CacheKey, fn: (tx: CacheIndexWriter) => Promise<T>): Promise<T> {
    const id = cacheKeyToString(key)
    const previous = this.locks.get(id) ?? Promise.resolve()

    let unlock: () => void = () => {}
    const current = new Promise<void>((resolve) => {
      unlock = resolve
    })
    const tail = previous.then(() => current)
    this.locks.set(id, tail)

    await previous

    try {
      return await fn(this)
    } finally {
      unlock()
      if (this.locks.get(id) === tail) this.locks.delete(id)
    }
  }
}
