import type { Clock } from "../../core/time/clock"
import type { EvictionMap } from "../../core/eviction/eviction-map"
import { LruMemoryMap } from "../../core/eviction/lru-memory-map"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheResult } from "../../ports/cache-result"
import type { LruReadOptions, LruStore, LruWriteOptions } from "../../ports/lru-store"
import type { Milliseconds } from "../../ports/time"

export type MemoryLruStoreDeps = {
  clock: Clock
}

type MemoryEntry = {
  value: Uint8Array
  expiresAtMs?: Milliseconds
}

/**
 * In-process LruStore backed by one {@link LruMemoryMap} per namespace.
 *
 * @remarks
 * Expired entries are dropped lazily when they are next observed. A write
 * that overflows the bound drops every expired entry before it evicts live
 * ones.
 */
export class MemoryLruStore implements LruStore {
  private readonly namespaces = new Map<string, EvictionMap<CacheKey, MemoryEntry>>()

  public constructor(private readonly deps: MemoryLruStoreDeps) {}

  async read(
    namespace: string,
    key: CacheKey,
    opts: LruReadOptions,
  ): Promise<CacheResult<Uint8Array>> {
    const map = this.namespaces.get(namespace)
    const entry = map?.peek(key)

    if (map === undefined || entry === undefined) return { kind: "miss" }

    if (this.isExpired(entry)) {
      this.drop(namespace, map, key)
      return { kind: "miss" }
    }

    if (opts.slidingTtlMs !== undefined) {
      map.set(key, { value: entry.value, expiresAtMs: this.expiresAt(opts.slidingTtlMs) })
    } else if (opts.touch) {
      map.get(key)
    }

    return { kind: "hit", value: new Uint8Array(entry.value) }
  }

  async write(
    namespace: string,
    key: CacheKey,
    value: Uint8Array,
    opts: LruWriteOptions,
  ): Promise<readonly CacheKey[]> {
    const map = this.namespaceMap(namespace)

    map.set(key, {
      value: new Uint8Array(value),
      ...(opts.ttlMs !== undefined && { expiresAtMs: this.expiresAt(opts.ttlMs) }),
    })

    return this.evictOverflow(map, opts.maxSize)
  }

  async remove(namespace: string, key: CacheKey): Promise<void> {
    const map = this.namespaces.get(namespace)

    if (map) this.drop(namespace, map, key)
  }

  async exists(namespace: string, key: CacheKey): Promise<boolean> {
    const map = this.namespaces.get(namespace)
    const entry = map?.peek(key)

    if (map === undefined || entry === undefined) return false

    if (this.isExpired(entry)) {
      this.drop(namespace, map, key)
      return false
    }

    return true
  }

  async members(namespace: string): Promise<readonly CacheKey[]> {
    const map = this.namespaces.get(namespace)

    if (map === undefined) return []

    const live: CacheKey[] = []

    for (const key of map.keys()) {
      const entry = map.peek(key)

      if (entry === undefined || this.isExpired(entry)) map.delete(key)
      else live.push(key)
    }

    if (map.size() === 0) this.namespaces.delete(namespace)

    return live
  }

  async clear(namespace: string): Promise<number> {
    const map = this.namespaces.get(namespace)

    if (map === undefined) return 0

    this.namespaces.delete(namespace)

    return map.size()
  }

  private evictOverflow(
    map: EvictionMap<CacheKey, MemoryEntry>,
    maxSize: number,
  ): CacheKey[] {
    const evicted: CacheKey[] = []

    if (map.size() <= maxSize) return evicted

    for (const key of map.keys()) {
      const entry = map.peek(key)

      if (entry === undefined || this.isExpired(entry)) map.delete(key)
    }

    while (map.size() > maxSize) {
      const victim = map.victim()

      if (victim === undefined) {
        throw new Error(
          "Invariant violation: EvictionMap.victim() returned undefined while over capacity",
        )
      }

      map.delete(victim)
      evicted.push(victim)
    }

    return evicted
  }

  private drop(
    namespace: string,
    map: EvictionMap<CacheKey, MemoryEntry>,
    key: CacheKey,
  ): void {
    map.delete(key)

    if (map.size() === 0) this.namespaces.delete(namespace)
  }

  private namespaceMap(namespace: string): EvictionMap<CacheKey, MemoryEntry> {
    const existing = this.namespaces.get(namespace)

    if (existing) return existing

    const created = new LruMemoryMap<CacheKey, MemoryEntry>()
    this.namespaces.set(namespace, created)

    return created
  }

  private expiresAt(ttlMs: Milliseconds): Milliseconds {
    return this.deps.clock.nowMs() + ttlMs
  }

  private isExpired(entry: MemoryEntry): boolean {
    return entry.expiresAtMs !== undefined && entry.expiresAtMs <= this.deps.clock.nowMs()
  }
}
