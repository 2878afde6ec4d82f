import { logLevelNames } from "@lrukit/logger"
import { z } from "zod"

/**
 * Environment-driven settings of a Redis-backed cache, read with the `LRU_`
 * prefix by {@link EnvSource}.
 */
export const cacheEnvSchema = z.object({
  REDIS_URL: z.string().min(1).default("redis://localhost:6379"),
  KEYSPACE_PREFIX: z.string().default("lru:"),
  NAMESPACE: z.string().min(1),
  MAX_SIZE: z.coerce.number().int().positive(),
  EXPIRATION_SECONDS: z.coerce.number().positive().optional(),
  EXPIRATION_MODE: z.enum(["write", "access"]).default("write"),
  LOG_LEVEL: z.enum(logLevelNames).default("info"),
})

export type CacheEnvConfig = z.infer<typeof cacheEnvSchema>
