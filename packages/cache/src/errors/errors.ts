import type { CacheKey } from "../ports/cache-key"
import { CacheError } from "./cache-error"
import type { ErrorContext } from "./error"

/**
 * The key is absent from the cache: never written, evicted, expired or deleted.
 */
export class KeyNotFoundError extends CacheError<"key_not_found"> {
  constructor(
    readonly namespace: string,
    readonly key: CacheKey,
  ) {
    super(`Key "${key}" not found in cache "${namespace}"`, {
      code: "key_not_found",
      context: { namespace, key },
    })
  }
}

/**
 * The backing store could not be reached or rejected a command.
 */
export class StoreUnavailableError extends CacheError<"store_unavailable"> {
  constructor(message: string, options: { context?: ErrorContext; cause?: unknown } = {}) {
    super(message, {
      code: "store_unavailable",
      isRetryable: true,
      ...options,
    })
  }
}

/**
 * A value or argument list could not be encoded, or stored bytes could not
 * be decoded.
 */
export class SerializationError extends CacheError<"serialization_failed"> {
  constructor(message: string, options: { context?: ErrorContext; cause?: unknown } = {}) {
    super(message, {
      code: "serialization_failed",
      isOperational: false,
      ...options,
    })
  }
}

export class InvalidCacheConfigError extends CacheError<"invalid_config"> {
  constructor(message: string, options: { context?: ErrorContext; cause?: unknown } = {}) {
    super(message, {
      code: "invalid_config",
      isOperational: false,
      ...options,
    })
  }
}
