/**
 * Internal abstraction for eviction-aware key/value storage used by the
 * in-memory store.
 *
 * Encapsulates recency ordering behind a minimal Map-like interface.
 */
export interface EvictionMap<K, V> {
  /**
   * Retrieve the value for the given key and mark it as most recently used.
   */
  get(key: K): V | undefined

  /**
   * Retrieve the value for the given key without touching its ordering.
   */
  peek(key: K): V | undefined

  /**
   * Insert or update the value for the given key.
   *
   * Implementations may update internal ordering as a side effect.
   */
  set(key: K, value: V): void

  /**
   * Remove the given key from the map.
   *
   * Returns true if the key was present.
   */
  delete(key: K): boolean

  has(key: K): boolean

  size(): number

  /**
   * Return the next key that should be evicted, or `undefined` if empty.
   */
  victim(): K | undefined

  /**
   * All keys in eviction order: the next victim first.
   */
  keys(): K[]
}
