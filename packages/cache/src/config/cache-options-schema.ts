import { z } from "zod"
import { InvalidCacheConfigError } from "../errors/errors"
import type { CacheTtl, ExpirationMode, LruCacheOptions, TimeOfDay } from "../ports/cache-options"
import type { Seconds } from "../ports/time"

const lruCacheOptionsSchema = z.object({
  // Braces delimit the namespace inside Redis key names.
  namespace: z
    .string()
    .min(1)
    .regex(/^[^{}]*$/, "must not contain '{' or '}'"),
  maxSize: z.number().int().positive(),
  expiration: z.number().positive().optional(),
  expirationMode: z.enum(["write", "access"]).default("write"),
})

const timeOfDaySchema = z.object({
  hour: z.number().int().min(0).max(23),
  minute: z.number().int().min(0).max(59).optional(),
  second: z.number().int().min(0).max(59).optional(),
})

const cacheTtlSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("seconds"), seconds: z.number().nonnegative() }),
  z.object({ kind: z.literal("milliseconds"), milliseconds: z.number().nonnegative() }),
  z.object({ kind: z.literal("until"), expiresAt: z.date() }),
])

export type ResolvedLruCacheOptions = {
  namespace: string
  maxSize: number
  expiration?: Seconds
  expirationMode: ExpirationMode
  excludeValues: ReadonlySet<unknown>
}

export function resolveLruCacheOptions(options: LruCacheOptions): ResolvedLruCacheOptions {
  const result = lruCacheOptionsSchema.safeParse({
    namespace: options.namespace,
    maxSize: options.maxSize,
    expiration: options.expiration,
    expirationMode: options.expirationMode,
  })

  if (!result.success) {
    throw new InvalidCacheConfigError(
      `Invalid cache options:\n${z.prettifyError(result.error)}`,
      { context: { namespace: options.namespace } },
    )
  }

  return {
    ...result.data,
    excludeValues: options.excludeValues ?? new Set(),
  }
}

export function validateTimeOfDay(at: TimeOfDay): TimeOfDay {
  const result = timeOfDaySchema.safeParse(at)

  if (!result.success) {
    throw new InvalidCacheConfigError(
      `Invalid time of day:\n${z.prettifyError(result.error)}`,
      { context: { hour: at.hour, minute: at.minute, second: at.second } },
    )
  }

  return result.data
}

/**
 * Rejects NaN, infinite and negative durations and invalid dates. An `until`
 * date in the past is valid.
 */
export function validateCacheTtl(ttl: CacheTtl): CacheTtl {
  const result = cacheTtlSchema.safeParse(ttl)

  if (!result.success) {
    throw new InvalidCacheConfigError(`Invalid ttl:\n${z.prettifyError(result.error)}`, {
      context: { kind: ttl.kind },
    })
  }

  return result.data
}
