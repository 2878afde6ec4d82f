import { SerializationError } from "../../errors/errors"

/**
 * Canonical string form of an argument list.
 *
 * Equal arguments produce equal strings regardless of object key order,
 * and distinct primitive types never collide (`1`, `"1"` and `1n` encode
 * differently).
 *
 * Supported: `undefined`, `null`, booleans, numbers, bigints, strings,
 * `Date`, `Uint8Array`, arrays, plain objects, `Map` and `Set`. Anything
 * else throws {@link SerializationError} naming the offending path.
 *
 * @example
 * ```ts
 * canonicalizeArgs([3, { b: 1, a: "x" }]) // '[d:3,{"a":"x","b":d:1}]'
 * ```
 */
export function canonicalizeArgs(args: readonly unknown[]): string {
  return encode(args, "$", new Set())
}

function encode(value: unknown, path: string, ancestors: Set<object>): string {
  if (typeof value === "object" && value !== null) {
    return encodeObject(value, path, ancestors)
  }

  return encodePrimitive(value, path)
}

function encodePrimitive(value: unknown, path: string): string {
  if (value === undefined) return "u"
  if (value === null) return "n"
  if (typeof value === "boolean") return value ? "b:true" : "b:false"
  if (typeof value === "number") return Object.is(value, -0) ? "d:0" : `d:${value}`
  if (typeof value === "bigint") return `i:${value.toString()}`
  if (typeof value === "string") return JSON.stringify(value)

  throw unsupported(path, typeof value)
}

function encodeObject(value: object, path: string, ancestors: Set<object>): string {
  if (ancestors.has(value)) {
    throw new SerializationError(
      `Cannot derive a cache key from a circular structure at ${path}`,
      { context: { path } },
    )
  }

  ancestors.add(value)

  try {
    return encodeContainer(value, path, ancestors)
  } finally {
    ancestors.delete(value)
  }
}

function encodeContainer(value: object, path: string, ancestors: Set<object>): string {
  if (Array.isArray(value)) {
    const items = value.map((item: unknown, i) => encode(item, `${path}[${i}]`, ancestors))

    return `[${items.join(",")}]`
  }

  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new SerializationError(`Cannot derive a cache key from an invalid Date at ${path}`, {
        context: { path },
      })
    }

    return `t:${value.toISOString()}`
  }

  if (value instanceof Uint8Array) {
    return `x:${Buffer.from(value.buffer, value.byteOffset, value.byteLength).toString("hex")}`
  }

  if (value instanceof Map) {
    const pairs = [...value.entries()].map(
      ([k, v]: [unknown, unknown], i) =>
        `${encode(k, `${path}<${i}>`, ancestors)}=>${encode(v, `${path}<${i}>`, ancestors)}`,
    )

    return `M{${pairs.sort().join(",")}}`
  }

  if (value instanceof Set) {
    const items = [...value].map((item: unknown, i) => encode(item, `${path}<${i}>`, ancestors))

    return `S[${items.sort().join(",")}]`
  }

  if (isPlainObject(value)) {
    const fields = Object.keys(value)
      .sort()
      .map((k) => `${JSON.stringify(k)}:${encode(value[k], `${path}.${k}`, ancestors)}`)

    return `{${fields.join(",")}}`
  }

  throw unsupported(path, constructorName(value))
}

function isPlainObject(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value)

  return proto === Object.prototype || proto === null
}

function constructorName(value: object): string {
  const ctor: unknown = Object.getPrototypeOf(value)?.constructor

  return typeof ctor === "function" && ctor.name !== "" ? ctor.name : "anonymous class"
}

function unsupported(path: string, type: string): SerializationError {
  return new SerializationError(`Unsupported argument type ${type} at ${path}`, {
    context: { path, type },
  })
}
