import type { AppError, CacheErrorCode } from "./error"

const CACHE_ERROR_CODES: ReadonlySet<string> = new Set<CacheErrorCode>([
  "key_not_found",
  "store_unavailable",
  "serialization_failed",
  "invalid_config",
])

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

function isValidDate(v: unknown): v is Date {
  return v instanceof Date && Number.isFinite(v.valueOf())
}

/**
 * Type guard for errors raised by the cache, including duck-typed copies
 * that crossed a module boundary.
 *
 * @example
 * ```ts
 * try {
 *   await cache.get("user:1")
 * } catch (err) {
 *   if (isCacheError(err) && err.code === "key_not_found") {
 *     // ...
 *   }
 * }
 * ```
 */
export function isCacheError(e: unknown): e is AppError<CacheErrorCode> {
  if (!isRecord(e)) return false

  const code = e["code"]

  return (
    typeof code === "string" &&
    CACHE_ERROR_CODES.has(code) &&
    isRecord(e["context"]) &&
    typeof e["isRetryable"] === "boolean" &&
    typeof e["isOperational"] === "boolean" &&
    isValidDate(e["timestamp"]) &&
    typeof e["message"] === "string" &&
    typeof e["name"] === "string"
  )
}
