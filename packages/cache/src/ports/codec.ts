/**
 * Codec defines a bidirectional transformation between a typed value `T`
 * and a byte representation.
 *
 * @remarks
 * Codecs sit at the boundary between the typed `LruCacheDict<T>` and the
 * byte-oriented {@link LruStore}. Stores treat codec output as opaque bytes.
 *
 * Codecs may throw on values they cannot represent (e.g. `BigInt` in JSON);
 * the cache reports those failures as `SerializationError`.
 *
 * @example
 * ```ts
 * const jsonCodec: Codec<User> = {
 *   encode(value) {
 *     return new TextEncoder().encode(JSON.stringify(value))
 *   },
 *   decode(bytes) {
 *     return JSON.parse(new TextDecoder().decode(bytes))
 *   },
 * }
 * ```
 */
export interface Codec<T> {
  encode(value: T): Uint8Array

  decode(bytes: Uint8Array): T
}
