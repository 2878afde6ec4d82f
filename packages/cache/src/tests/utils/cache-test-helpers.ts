import type { CacheKey } from "../../ports/cache-key"

export const bytes = {
  a(): Uint8Array {
    return new Uint8Array([1, 2, 3])
  },
  b(): Uint8Array {
    return new Uint8Array([9, 8, 7])
  },
  c(): Uint8Array {
    return new Uint8Array([4, 5, 6])
  },
  empty(): Uint8Array {
    return new Uint8Array([])
  },
}

export const keys = {
  one(): CacheKey {
    return "k:one"
  },
  two(): CacheKey {
    return "k:two"
  },
  three(): CacheKey {
    return "k:three"
  },
  four(): CacheKey {
    return "k:four"
  },
}

export const epoch = (): Date => new Date("2024-01-15T10:00:00.000Z")
