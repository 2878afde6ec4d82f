export { createMemoryLruStore } from "./adapters/memory/create"
export { MemoryLruStore, type MemoryLruStoreDeps } from "./adapters/memory/memory-lru-store"
export {
  createLruCacheFromConfig,
  type LruCacheFromConfigDeps,
  type RedisLruCache,
} from "./adapters/redis/create"
export {
  createRedisClient,
  type RedisBytesClient,
  type RedisBytesClientOptions,
} from "./adapters/redis/redis-client"
export { RedisLruStore, type RedisLruStoreOptions } from "./adapters/redis/redis-lru-store"
export { type CacheEnvConfig, cacheEnvSchema } from "./config/cache-env-schema"
export { Config, type IConfig } from "./config/config"
export { EnvSource, type EnvSourceOptions } from "./config/env-source"
export { type LoadConfigOptions, loadConfig } from "./config/load-config"
export { ObjectSource } from "./config/object-source"
export type { ConfigSource } from "./config/source"
export { createJsonCodec } from "./core/codec/json-codec"
export { createStructuredCodec } from "./core/codec/structured-codec"
export {
  type CachedFunction,
  cacheFunction,
  type FunctionCacheOptions,
  type OwnedCacheOptions,
  type SharedCacheOptions,
} from "./core/function-cache/cache-function"
export { canonicalizeArgs } from "./core/function-cache/canonical-args"
export { functionCacheKey } from "./core/function-cache/function-key"
export { LruCacheDict, type LruCacheDictDeps } from "./core/lru-cache-dict"
export { type Clock, SystemClock } from "./core/time/clock"
export { CacheError, type CacheErrorOptions, serializeError } from "./errors/cache-error"
export type { AppError, CacheErrorCode, ErrorContext, SerializedError } from "./errors/error"
export {
  InvalidCacheConfigError,
  KeyNotFoundError,
  SerializationError,
  StoreUnavailableError,
} from "./errors/errors"
export { isCacheError } from "./errors/is-cache-error"
export type { CacheKey } from "./ports/cache-key"
export type {
  CacheSetOptions,
  CacheTtl,
  ExpirationMode,
  LruCacheOptions,
  TimeOfDay,
} from "./ports/cache-options"
export type { CacheHit, CacheMiss, CacheResult } from "./ports/cache-result"
export type { Codec } from "./ports/codec"
export type { KeyspacePrefix } from "./ports/keyspace-prefix"
export type { LruReadOptions, LruStore, LruWriteOptions } from "./ports/lru-store"
export type { Milliseconds, Seconds } from "./ports/time"
