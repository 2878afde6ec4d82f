import { createPinoLogger, type Logger } from "@lrukit/logger"
import type { CacheEnvConfig } from "../../config/cache-env-schema"
import { LruCacheDict } from "../../core/lru-cache-dict"
import type { Clock } from "../../core/time/clock"
import type { Codec } from "../../ports/codec"
import { createRedisClient, type RedisBytesClient } from "./redis-client"
import { RedisLruStore } from "./redis-lru-store"

export type LruCacheFromConfigDeps<T> = {
  codec: Codec<T>
  logger?: Logger

  /**
   * Reuse an existing client instead of building one from `REDIS_URL`.
   */
  client?: RedisBytesClient
  clock?: Clock
}

export type RedisLruCache<T> = {
  cache: LruCacheDict<T>

  /**
   * Not yet connected. Caller owns `connect()` / `quit()`.
   */
  client: RedisBytesClient
}

/**
 * Compose a Redis client, {@link RedisLruStore} and {@link LruCacheDict}
 * from loaded configuration.
 *
 * @example
 * ```ts
 * const config = await loadConfig({ schema: cacheEnvSchema, sources: [new EnvSource()] })
 * const { cache, client } = createLruCacheFromConfig(config.value, { codec: createJsonCodec() })
 *
 * await client.connect()
 * ```
 */
export function createLruCacheFromConfig<T>(
  config: CacheEnvConfig,
  deps: LruCacheFromConfigDeps<T>,
): RedisLruCache<T> {
  const client = deps.client ?? createRedisClient({ url: config.REDIS_URL })
  const logger =
    deps.logger ?? createPinoLogger({}, { level: config.LOG_LEVEL }, { service: "lru-cache" })
  const store = new RedisLruStore(client, { keyspacePrefix: config.KEYSPACE_PREFIX })

  const cache = new LruCacheDict<T>(
    {
      store,
      codec: deps.codec,
      logger,
      ...(deps.clock && { clock: deps.clock }),
    },
    {
      namespace: config.NAMESPACE,
      maxSize: config.MAX_SIZE,
      expirationMode: config.EXPIRATION_MODE,
      ...(config.EXPIRATION_SECONDS !== undefined && {
        expiration: config.EXPIRATION_SECONDS,
      }),
    },
  )

  return { cache, client }
}
