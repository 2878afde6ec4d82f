import type { ZodType } from "zod"
import type { Codec } from "../../ports/codec"

/**
 * UTF-8 JSON codec. When a schema is given, decoded values are validated
 * against it.
 *
 * @example
 * ```ts
 * const codec = createJsonCodec(z.object({ id: z.string(), name: z.string() }))
 * ```
 */
export function createJsonCodec<T>(schema?: ZodType<T>): Codec<T> {
  const encoder = new TextEncoder()
  const decoder = new TextDecoder("utf-8", { fatal: true })

  return {
    encode(value: T): Uint8Array {
      const json = JSON.stringify(value)

      if (json === undefined) {
        throw new TypeError(`Value of type ${typeof value} has no JSON representation`)
      }

      return encoder.encode(json)
    },

    decode(bytes: Uint8Array): T {
      const parsed = JSON.parse(decoder.decode(bytes))

      return schema ? schema.parse(parsed) : parsed
    },
  }
}
