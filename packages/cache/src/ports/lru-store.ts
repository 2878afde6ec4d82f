import type { CacheKey } from "./cache-key"
import type { CacheResult } from "./cache-result"
import type { Milliseconds } from "./time"

export type LruReadOptions = {
  /**
   * Mark the entry as most recently used.
   */
  touch: boolean

  /**
   * Re-arm the entry's TTL to this many milliseconds (sliding expiration).
   * Only applied on a hit.
   */
  slidingTtlMs?: Milliseconds
}

export type LruWriteOptions = {
  /**
   * Upper bound on entries in the namespace after this write.
   */
  maxSize: number

  /**
   * Lifetime of the written entry. Must be positive; omit for no expiry.
   */
  ttlMs?: Milliseconds
}

/**
 * Backing-store protocol of an LRU cache.
 *
 * Every namespace holds two coupled records per entry: the value itself and a
 * recency marker in a namespace-wide ordered structure. Implementations keep
 * the two in step.
 *
 * @remarks
 * - `write` is atomic with respect to other callers: storing the value,
 *   refreshing the recency marker and evicting overflow happen as one step,
 *   so concurrent writers cannot push a namespace past `maxSize`.
 * - Expiry is enforced by the store; an expired entry is never returned.
 * - Implementations may reject with transport errors; callers decide how to
 *   surface them.
 */
export interface LruStore {
  /**
   * Read an entry, optionally refreshing its recency and TTL.
   */
  read(
    namespace: string,
    key: CacheKey,
    opts: LruReadOptions,
  ): Promise<CacheResult<Uint8Array>>

  /**
   * Write an entry and evict least-recently-used entries beyond `maxSize`.
   *
   * @returns The evicted keys, least recently used first.
   */
  write(
    namespace: string,
    key: CacheKey,
    value: Uint8Array,
    opts: LruWriteOptions,
  ): Promise<readonly CacheKey[]>

  /**
   * Remove an entry and its recency marker. Removing a missing key is a no-op.
   */
  remove(namespace: string, key: CacheKey): Promise<void>

  /**
   * Whether a live entry exists. Never affects recency.
   */
  exists(namespace: string, key: CacheKey): Promise<boolean>

  /**
   * Live keys ordered least- to most-recently used.
   *
   * Recency markers whose value has expired are pruned as a side effect.
   */
  members(namespace: string): Promise<readonly CacheKey[]>

  /**
   * Remove every entry of the namespace.
   *
   * @returns The number of tracked entries removed.
   */
  clear(namespace: string): Promise<number>
}
