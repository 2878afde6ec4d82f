/**
 * CacheKey is intentionally a plain string for ergonomics.
 *
 * Keys are scoped by the cache namespace they are written to, so the same key
 * may exist independently in several namespaces of one store.
 *
 * @remarks
 * Function caches derive keys as `<function name>:<sha256 of canonical args>`.
 *
 * @example
 * ```ts
 * const key: CacheKey = "users.by-id:123"
 * ```
 */
export type CacheKey = string
