import { deserialize, serialize } from "node:v8"
import type { Codec } from "../../ports/codec"

/**
 * Codec over the V8 structured-clone format. Preserves `Date`, `Map`, `Set`,
 * `BigInt`, typed arrays and `undefined`; rejects functions and symbols.
 */
export function createStructuredCodec<T>(): Codec<T> {
  return {
    encode(value: T): Uint8Array {
      return new Uint8Array(serialize(value))
    },

    decode(bytes: Uint8Array): T {
      return deserialize(bytes)
    },
  }
}
