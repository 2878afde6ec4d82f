export type CacheErrorCode =
  | "key_not_found"
  | "store_unavailable"
  | "serialization_failed"
  | "invalid_config"

/**
 * Contextual metadata attached to errors.
 * Use this to carry structured data (namespace, key, operation) without string munging.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError<C extends string = string> extends Error {
  /** Error code for programmatic handling */
  readonly code: C

  /** Structured metadata for debugging */
  readonly context: ErrorContext

  /** `true` if retrying might succeed */
  readonly isRetryable: boolean

  /**
   * Whether this is an expected runtime failure (true) or a programmer
   * error / invariant violation (false).
   *
   * @remarks
   * - Operational (`true`): missing key, store unreachable.
   * - Non-operational (`false`): invalid configuration, values the codec cannot represent.
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  /**
   * Underlying cause
   *
   * See {@link https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Error/cause Error.cause}
   */
  readonly cause?: unknown
}

/**
 * Serialized error shape for logging, APIs, and transport.
 *
 * Designed to be JSON.stringify-safe.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
