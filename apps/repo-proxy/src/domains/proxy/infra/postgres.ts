import { createHash } from "node:crypto"

const POSTGRES_INT64_MAX = 9223372036854775807n

export type PgQueryable = {
  query: (sql: string, params?: unknown[]) => Promise<{ rows: unknown[] }>
}

export type PgPoolClient = PgQueryable & {
  release: (err?: Error | boolean) => void
}

/** The part of `pg.Pool` the adapters use. */
export type PgPool = PgQueryable & {
  connect: () => Promise<PgPoolClient>
}

/**
 * Hash a lock key to a signed 64-bit integer for `pg_advisory_xact_lock`.
 *
 * SHA-256 truncated to 64 bits, read as signed big-endian.
 */
export function hashLockKeyInt64(key: string): bigint {
  const hash = createHash("sha256").update(key, "utf8").digest()

  const unsigned = hash.readBigUInt64BE(0)

  return unsigned > POSTGRES_INT64_MAX ? unsigned - 0x10000000000000000n : unsigned
}
