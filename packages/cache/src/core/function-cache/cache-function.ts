import { createNullLogger, type Logger } from "@lrukit/logger"
import { validateCacheTtl, validateTimeOfDay } from "../../config/cache-options-schema"
import { InvalidCacheConfigError, StoreUnavailableError } from "../../errors/errors"
import type { CacheKey } from "../../ports/cache-key"
import type {
  CacheSetOptions,
  CacheTtl,
  ExpirationMode,
  TimeOfDay,
} from "../../ports/cache-options"
import type { CacheResult } from "../../ports/cache-result"
import type { Codec } from "../../ports/codec"
import type { LruStore } from "../../ports/lru-store"
import type { Seconds } from "../../ports/time"
import { createStructuredCodec } from "../codec/structured-codec"
import { LruCacheDict } from "../lru-cache-dict"
import { type Clock, SystemClock } from "../time/clock"
import { nextDailyExpiry } from "../time/ttl"
import { functionCacheKey } from "./function-key"

type FunctionCacheBaseOptions = {
  /**
   * Identity of the function in cache keys. Defaults to `fn.name`; required
   * for anonymous functions.
   */
  name?: string

  /**
   * Lifetime of entries written by this function, overriding the cache's
   * configured expiration.
   */
  ttl?: CacheTtl

  /**
   * Entries expire at the next occurrence of this UTC time of day. Takes
   * precedence over `ttl`. Not allowed on a cache whose reads re-arm the
   * expiration, since a read would carry the entry past that time.
   */
  expireOn?: TimeOfDay

  logger?: Logger
  clock?: Clock
}

export type SharedCacheOptions<R> = FunctionCacheBaseOptions & {
  cache: LruCacheDict<R>
}

export type OwnedCacheOptions<R> = FunctionCacheBaseOptions & {
  store: LruStore
  maxSize: number
  expiration?: Seconds
  expirationMode?: ExpirationMode

  /**
   * Default: `fn:<name>`.
   */
  namespace?: string

  /**
   * Results never written to the cache.
   */
  excludeValues?: ReadonlySet<unknown>

  /**
   * Default: structured-clone codec.
   */
  codec?: Codec<R>
}

export type FunctionCacheOptions<R> = SharedCacheOptions<R> | OwnedCacheOptions<R>

export type CachedFunction<TArgs extends unknown[], R> = ((
  ...args: TArgs
) => Promise<R>) & {
  readonly cache: LruCacheDict<R>
  keyFor(...args: TArgs): CacheKey
}

/**
 * Wrap a function so that results are memoized in an LRU cache keyed by the
 * function's name and its canonicalized arguments.
 *
 * @remarks
 * - A hit returns the cached value without calling `fn`.
 * - If the store is unavailable the call goes through to `fn`; failed writes
 *   are logged and dropped.
 * - Errors thrown by `fn` propagate and are not cached.
 * - Arguments that cannot be canonicalized reject with `SerializationError`
 *   before `fn` runs.
 * - `fn` is called without a `this`; bind methods before wrapping.
 *
 * @example
 * ```ts
 * const getUser = cacheFunction(fetchUser, { store, maxSize: 500, expiration: 60 })
 *
 * await getUser("42") // calls fetchUser
 * await getUser("42") // served from cache
 * ```
 */
export function cacheFunction<TArgs extends unknown[], R>(
  fn: (...args: TArgs) => R | PromiseLike<R>,
  options: FunctionCacheOptions<R>,
): CachedFunction<TArgs, R> {
  const name = options.name ?? fn.name

  if (name === "") {
    throw new InvalidCacheConfigError(
      "Cannot cache an anonymous function without an explicit `name`",
    )
  }

  const expireOn = options.expireOn ? validateTimeOfDay(options.expireOn) : undefined
  const ttl = options.ttl ? validateCacheTtl(options.ttl) : undefined
  const clock = options.clock ?? new SystemClock()
  const cache = "cache" in options ? options.cache : createOwnedCache(name, clock, options)

  if (expireOn && cache.slidesOnAccess) {
    throw new InvalidCacheConfigError(
      "`expireOn` cannot be combined with a cache that re-arms expiration on access",
      { context: { namespace: cache.namespace, function: name } },
    )
  }
  const logger = (options.logger ?? createNullLogger()).child({
    module: "function-cache",
    namespace: cache.namespace,
    function: name,
  })

  const setOptions = (): Partial<CacheSetOptions> | undefined => {
    if (expireOn) return { ttl: { kind: "until", expiresAt: nextDailyExpiry(expireOn, clock) } }
    if (ttl) return { ttl }

    return undefined
  }

  const lookup = async (key: CacheKey): Promise<CacheResult<R>> => {
    try {
      return await cache.tryGet(key)
    } catch (err) {
      if (!(err instanceof StoreUnavailableError)) throw err

      logger.warn("cache read failed, calling through", { key, operation: "get", err })

      return { kind: "miss" }
    }
  }

  const remember = async (key: CacheKey, value: R): Promise<void> => {
    try {
      await cache.set(key, value, setOptions())
    } catch (err) {
      if (!(err instanceof StoreUnavailableError)) throw err

      logger.warn("cache write failed, result not cached", { key, operation: "set", err })
    }
  }

  const invoke = (args: TArgs): Promise<R> =>
    new Promise<R>((resolve) => {
      resolve(fn(...args))
    })

  const keyFor = (...args: TArgs): CacheKey => functionCacheKey(name, args)

  const cached = async (...args: TArgs): Promise<R> => {
    const key = keyFor(...args)
    const hit = await lookup(key)

    if (hit.kind === "hit") return hit.value

    return invoke(args).then(async (result) => {
      await remember(key, result)

      return result
    })
  }

  return Object.assign(cached, { cache, keyFor })
}

function createOwnedCache<R>(
  name: string,
  clock: Clock,
  options: OwnedCacheOptions<R>,
): LruCacheDict<R> {
  return new LruCacheDict<R>(
    {
      store: options.store,
      codec: options.codec ?? createStructuredCodec<R>(),
      clock,
      ...(options.logger && { logger: options.logger }),
    },
    {
      namespace: options.namespace ?? `fn:${name}`,
      maxSize: options.maxSize,
      ...(options.expiration !== undefined && { expiration: options.expiration }),
      ...(options.expirationMode && { expirationMode: options.expirationMode }),
      ...(options.excludeValues && { excludeValues: options.excludeValues }),
    },
  )
}
