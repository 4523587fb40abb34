import { z } from "zod/mini"
import { type CacheDescriptor, type CacheKey, cacheKeyToString } from "../model/cache.model"
import type { CacheIndex, CacheIndexWriter } from "../services/cache-index"
import { hashLockKeyInt64, type PgPool, type PgQueryable } from "./postgres"

const SELECT_DESCRIPTOR = `
  select lastmodified, filesize, etag, updatedate
  from cacheitem
  where reponame = $1 and pathname = $2
  limit 1`

const UPSERT_DESCRIPTOR = `
  insert into cacheitem (reponame, pathname, lastmodified, filesize, etag, updatedate)
  values ($1, $2, $3, $4, $5, $6)
  on conflict (reponame, pathname) do update set
    lastmodified = excluded.lastmodified,
    filesize = excluded.filesize,
    etag = excluded.etag,
    updatedate = excluded.updatedate`

const descriptorRow = z.object({
  lastmodified: z.nullable(z.string()),
  // int8 columns arrive as strings
  filesize: z.nullable(z.coerce.number()),
  etag: z.nullable(z.string()),
  updatedate: z.nullable(z.date()),
})

export type CacheIndexPostgresDeps = {
  pool: PgPool
}

export class CacheIndexPostgres implements CacheIndex {
  constructor(private readonly deps: CacheIndexPostgresDeps) {}

  async get(key: CacheKey): Promise<CacheDescriptor | null> {
    const { rows } = await this.deps.pool.query(SELECT_DESCRIPTOR, [key.repository, key.path])

    const [first] = rows
    if (first === undefined) return null

    const row = z.parse(descriptorRow, first)

    return {
      lastModified: row.lastmodified ?? "",
      fileSize: row.filesize ?? 0,
      etag: row.etag ?? "",
      updatedAt: row.updatedate ?? new Date(0),
    }
  }

  async upsert(key: CacheKey, descriptor: CacheDescriptor): Promise<void> {
    await upsertDescriptor(this.deps.pool, key, descriptor)
  }

  /**
   * Holds a transaction-scoped advisory lock on a dedicated connection while
   * `fn` runs; the lock is released by the commit or rollback. Upserts made
   * through `tx` run on that same connection.
   */
  async withKeyLock<T>(key: CacheKey, fn: (tx: CacheIndexWriter) => Promise<T>): Promise<T> {
    const client = await this.deps.pool.connect()
    let released = false

    try {
      await client.query("begin")
      await client.query("select pg_advisory_xact_lock($1)", [
        hashLockKeyInt64(cacheKeyToString(key)),
      ])

      const result = await fn({
        upsert: (txKey, descriptor) => upsertDescriptor(client, txKey, descriptor),
      })

      await client.query("commit")

      return result
    } catch (err) {
      try {
        await client.query("rollback")
      } catch (rollbackErr) {
        released = true
        client.release(rollbackErr instanceof Error ? rollbackErr : true)
      }

      throw err
    } finally {
      if (!released) client.release()
    }
  }
}

async function upsertDescriptor(
  db: PgQueryable,
  key: CacheKey,
  descriptor: CacheDescriptor,
): Promise<void> {
  await db.query(UPSERT_DESCRIPTOR, [
    key.repository,
    key.path,
    descriptor.lastModified,
    descriptor.fileSize,
    descriptor.etag,
    descriptor.updatedAt,
  ])
}
