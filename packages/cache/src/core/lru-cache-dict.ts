import { createNullLogger, type Logger } from "@lrukit/logger"
import {
  type ResolvedLruCacheOptions,
  resolveLruCacheOptions,
  validateCacheTtl,
} from "../config/cache-options-schema"
import { KeyNotFoundError, SerializationError, StoreUnavailableError } from "../errors/errors"
import type { CacheKey } from "../ports/cache-key"
import type { CacheSetOptions, CacheTtl, LruCacheOptions } from "../ports/cache-options"
import type { CacheResult } from "../ports/cache-result"
import type { Codec } from "../ports/codec"
import type { LruReadOptions, LruStore } from "../ports/lru-store"
import type { Milliseconds } from "../ports/time"
import { type Clock, SystemClock } from "./time/clock"
import { ttlToMs } from "./time/ttl"

export type LruCacheDictDeps<T> = {
  store: LruStore
  codec: Codec<T>
  logger?: Logger
  clock?: Clock
}

/**
 * A bounded, optionally expiring key/value cache kept in an {@link LruStore}.
 *
 * @remarks
 * - Every successful `get` and every `set` marks the key as most recently
 *   used. When a `set` pushes the namespace past `maxSize`, the least
 *   recently used entries are evicted in the same atomic store call.
 * - `has`, `peek`, `size` and `keys` never change recency.
 * - With `expiration`, entries expire that many seconds after their last
 *   write (`expirationMode: "write"`) or last access (`"access"`).
 * - Store failures surface as {@link StoreUnavailableError}; they are never
 *   reported as a miss.
 *
 * @example
 * ```ts
 * const users = new LruCacheDict<User>(
 *   { store: new RedisLruStore(client, { keyspacePrefix: "app:" }), codec: createJsonCodec() },
 *   { namespace: "users", maxSize: 1000, expiration: 300 },
 * )
 *
 * await users.set("42", { id: "42", name: "Ada" })
 * const user = await users.get("42")
 * ```
 */
export class LruCacheDict<T> {
  private readonly opts: ResolvedLruCacheOptions
  private readonly clock: Clock
  private readonly logger: Logger

  public constructor(
    private readonly deps: LruCacheDictDeps<T>,
    options: LruCacheOptions,
  ) {
    this.opts = resolveLruCacheOptions(options)
    this.clock = deps.clock ?? new SystemClock()
    this.logger = (deps.logger ?? createNullLogger()).child({
      module: "lru-cache-dict",
      namespace: this.opts.namespace,
    })
  }

  get namespace(): string {
    return this.opts.namespace
  }

  get maxSize(): number {
    return this.opts.maxSize
  }

  /**
   * Whether touching reads re-arm entries to the configured expiration.
   */
  get slidesOnAccess(): boolean {
    return this.opts.expirationMode === "access" && this.opts.expiration !== undefined
  }

  /**
   * @throws {KeyNotFoundError} if the key is absent or expired.
   */
  async get(key: CacheKey): Promise<T> {
    const result = await this.tryGet(key)

    if (result.kind === "miss") throw new KeyNotFoundError(this.opts.namespace, key)

    return result.value
  }

  async tryGet(key: CacheKey): Promise<CacheResult<T>> {
    const result = await this.callStore("get", key, () =>
      this.deps.store.read(this.opts.namespace, key, this.touchingRead()),
    )

    return this.decodeResult(key, result)
  }

  async getOrDefault<D>(key: CacheKey, fallback: D): Promise<T | D> {
    const result = await this.tryGet(key)

    return result.kind === "hit" ? result.value : fallback
  }

  /**
   * Read without refreshing recency or a sliding TTL.
   */
  async peek(key: CacheKey): Promise<CacheResult<T>> {
    const result = await this.callStore("peek", key, () =>
      this.deps.store.read(this.opts.namespace, key, { touch: false }),
    )

    return this.decodeResult(key, result)
  }

  async set(key: CacheKey, value: T, opts?: Partial<CacheSetOptions>): Promise<void> {
    const ttl = opts?.ttl && validateCacheTtl(opts.ttl)

    if (this.opts.excludeValues.has(value)) {
      this.logger.debug("value excluded from cache", { key, operation: "set" })
      return
    }

    const bytes = this.encode(key, value)
    const ttlMs = this.resolveTtlMs(ttl)

    if (ttlMs !== undefined && ttlMs <= 0) {
      await this.delete(key)
      return
    }

    const evicted = await this.callStore("set", key, () =>
      this.deps.store.write(this.opts.namespace, key, bytes, {
        maxSize: this.opts.maxSize,
        ...(ttlMs !== undefined && { ttlMs }),
      }),
    )

    if (evicted.length > 0) {
      this.logger.debug("evicted least recently used entries", {
        key,
        operation: "set",
        evicted,
      })
    }
  }

  async delete(key: CacheKey): Promise<void> {
    await this.callStore("delete", key, () =>
      this.deps.store.remove(this.opts.namespace, key),
    )
  }

  async has(key: CacheKey): Promise<boolean> {
    return this.callStore("has", key, () => this.deps.store.exists(this.opts.namespace, key))
  }

  async size(): Promise<number> {
    const members = await this.keys()

    return members.length
  }

  /**
   * Live keys, least recently used first.
   */
  async keys(): Promise<readonly CacheKey[]> {
    return this.callStore("keys", undefined, () => this.deps.store.members(this.opts.namespace))
  }

  /**
   * Remove every entry of this cache's namespace.
   *
   * @returns The number of entries removed.
   */
  async clear(): Promise<number> {
    const removed = await this.callStore("clear", undefined, () =>
      this.deps.store.clear(this.opts.namespace),
    )

    this.logger.debug("cache cleared", { operation: "clear", removed })

    return removed
  }

  private touchingRead(): LruReadOptions {
    const { expiration } = this.opts

    if (this.slidesOnAccess && expiration !== undefined) {
      return { touch: true, slidingTtlMs: expiration * 1000 }
    }

    return { touch: true }
  }

  private resolveTtlMs(ttl: CacheTtl | undefined): Milliseconds | undefined {
    if (ttl) return ttlToMs(ttl, this.clock)
    if (this.opts.expiration === undefined) return undefined

    return this.opts.expiration * 1000
  }

  private encode(key: CacheKey, value: T): Uint8Array {
    try {
      return this.deps.codec.encode(value)
    } catch (err) {
      throw new SerializationError(`Failed to encode value for key "${key}"`, {
        context: { namespace: this.opts.namespace, key },
        cause: err,
      })
    }
  }

  private decodeResult(key: CacheKey, result: CacheResult<Uint8Array>): CacheResult<T> {
    if (result.kind === "miss") return result

    try {
      return { kind: "hit", value: this.deps.codec.decode(result.value) }
    } catch (err) {
      throw new SerializationError(`Failed to decode cached value for key "${key}"`, {
        context: { namespace: this.opts.namespace, key },
        cause: err,
      })
    }
  }

  private async callStore<R>(
    operation: string,
    key: CacheKey | undefined,
    fn: () => Promise<R>,
  ): Promise<R> {
    try {
      return await fn()
    } catch (err) {
      throw new StoreUnavailableError(`Backing store failed during ${operation}`, {
        context: {
          namespace: this.opts.namespace,
          operation,
          ...(key !== undefined && { key }),
        },
        cause: err,
      })
    }
  }
}
