import { createHash } from "node:crypto"
import type { CacheKey } from "../../ports/cache-key"
import { canonicalizeArgs } from "./canonical-args"

/**
 * `<name>:<sha256 hex of the canonical argument list>`.
 */
export function functionCacheKey(name: string, args: readonly unknown[]): CacheKey {
  const digest = createHash("sha256").update(canonicalizeArgs(args)).digest("hex")

  return `${name}:${digest}`
}
