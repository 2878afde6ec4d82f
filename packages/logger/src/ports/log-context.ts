import type { CacheLogKey, Milliseconds } from "./log-types"

export type LogContext = {
  service: string
  module: string
  env: string

  /** Logical cache namespace the entry belongs to. */
  namespace: string
  key: CacheLogKey
  operation: string

  durationMs: Milliseconds
}

export type LogEvent = {
  err: unknown

  /** Keys removed by an eviction pass. */
  evicted: readonly CacheLogKey[]
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
