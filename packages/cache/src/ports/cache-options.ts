import type { Milliseconds, Seconds } from "./time"

type SecondsTtl = { kind: "seconds"; seconds: Seconds }
type MillisecondsTtl = { kind: "milliseconds"; milliseconds: Milliseconds }
type UntilDateTtl = { kind: "until"; expiresAt: Date }

export type CacheTtl = SecondsTtl | MillisecondsTtl | UntilDateTtl

/**
 * What restarts an entry's expiration countdown.
 *
 * - `"write"`: only `set` (reads do not extend the lifetime)
 * - `"access"`: `set` and every successful `get` (sliding expiration)
 */
export type ExpirationMode = "write" | "access"

export type CacheSetOptions = {
  /**
   * Overrides the cache's configured expiration for this write.
   */
  ttl: CacheTtl
}

export type LruCacheOptions = {
  /**
   * Logical cache name. All entries of the cache live under this namespace
   * in the backing store, isolated from other caches sharing the store.
   */
  namespace: string

  /**
   * Maximum number of live entries. Writing past this bound evicts the
   * least-recently-used entries.
   */
  maxSize: number

  /**
   * Entry lifetime in seconds. Entries never expire when omitted.
   */
  expiration?: Seconds

  /**
   * Default: `"write"`.
   *
   * In `"access"` mode a touching read re-arms the entry to `expiration`,
   * replacing any per-call `ttl` the entry was written with.
   */
  expirationMode?: ExpirationMode

  /**
   * Values that are never written to the cache (compared with SameValueZero,
   * as `Set#has` does). Typical use: `new Set([null, undefined])`.
   */
  excludeValues?: ReadonlySet<unknown>
}

/**
 * A wall-clock time of day in UTC.
 */
export type TimeOfDay = {
  hour: number
  minute?: number
  second?: number
}
