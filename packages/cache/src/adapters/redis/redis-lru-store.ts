import type { CacheKey } from "../../ports/cache-key"
import type { CacheResult } from "../../ports/cache-result"
import type { KeyspacePrefix } from "../../ports/keyspace-prefix"
import type { LruReadOptions, LruStore, LruWriteOptions } from "../../ports/lru-store"
import type { RedisBytesClient } from "./redis-client"

export type RedisLruStoreOptions = {
  keyspacePrefix: KeyspacePrefix
}

type NamespaceKeys = {
  recency: string
  seq: string
  entryPrefix: string
}

/**
 * Redis implementation of LruStore.
 *
 * @remarks
 * Layout per namespace (the `{namespace}` hash tag keeps them in one slot):
 * - `<prefix>{ns}:entry:<key>`: the value, with a native TTL when expiring
 * - `<prefix>{ns}:recency`: sorted set of keys scored by last use
 * - `<prefix>{ns}:seq`: counter supplying strictly increasing scores
 *
 * Writes, touching reads and pruning run as Lua scripts so each is atomic.
 */
export class RedisLruStore implements LruStore {
  public constructor(
    private readonly client: RedisBytesClient,
    private readonly opts: RedisLruStoreOptions,
  ) {}

  async read(
    namespace: string,
    key: CacheKey,
    opts: LruReadOptions,
  ): Promise<CacheResult<Uint8Array>> {
    const ns = this.namespaceKeys(namespace)
    const entryKey = `${ns.entryPrefix}${key}`

    if (!opts.touch) {
      return this.createCacheResult(await this.client.get(entryKey))
    }

    const reply = await this.client.eval(this.touchScript(), {
      keys: [ns.recency, ns.seq, entryKey],
      arguments: [key, this.toTtlArg(opts.slidingTtlMs)],
    })

    return this.createCacheResult(reply)
  }

  async write(
    namespace: string,
    key: CacheKey,
    value: Uint8Array,
    opts: LruWriteOptions,
  ): Promise<readonly CacheKey[]> {
    const ns = this.namespaceKeys(namespace)

    const reply = await this.client.eval(this.writeScript(), {
      keys: [ns.recency, ns.seq, `${ns.entryPrefix}${key}`],
      arguments: [
        key,
        this.toBuffer(value),
        this.toTtlArg(opts.ttlMs),
        String(opts.maxSize),
        ns.entryPrefix,
      ],
    })

    return this.asKeys(reply)
  }

  async remove(namespace: string, key: CacheKey): Promise<void> {
    const ns = this.namespaceKeys(namespace)

    const tx = this.client.multi()
    tx.del(`${ns.entryPrefix}${key}`)
    tx.zRem(ns.recency, key)

    await tx.exec()
  }

  async exists(namespace: string, key: CacheKey): Promise<boolean> {
    const ns = this.namespaceKeys(namespace)
    const count = await this.client.exists(`${ns.entryPrefix}${key}`)

    return count >= 1
  }

  async members(namespace: string): Promise<readonly CacheKey[]> {
    const ns = this.namespaceKeys(namespace)

    const reply = await this.client.eval(this.membersScript(), {
      keys: [ns.recency],
      arguments: [ns.entryPrefix],
    })

    return this.asKeys(reply)
  }

  async clear(namespace: string): Promise<number> {
    const ns = this.namespaceKeys(namespace)

    const reply = await this.client.eval(this.clearScript(), {
      keys: [ns.recency, ns.seq],
      arguments: [ns.entryPrefix],
    })

    if (typeof reply !== "number") {
      throw new TypeError(`Unexpected reply to clear: ${typeof reply}`)
    }

    return reply
  }

  private touchScript(): string {
    return `
      -- KEYS[1] = recency zset
      -- KEYS[2] = sequence counter
      -- KEYS[3] = entry key
      -- ARGV[1] = member
      -- ARGV[2] = sliding ttlMs (empty => leave TTL alone)

      local value = redis.call('GET', KEYS[3])
      if not value then
        redis.call('ZREM', KEYS[1], ARGV[1])
        return nil
      end

      local seq = redis.call('INCR', KEYS[2])
      redis.call('ZADD', KEYS[1], 'XX', seq, ARGV[1])

      if ARGV[2] ~= '' then
        redis.call('PEXPIRE', KEYS[3], tonumber(ARGV[2]))
      end

      return value
    `
  }

  private writeScript(): string {
    return `
      -- KEYS[1] = recency zset
      -- KEYS[2] = sequence counter
      -- KEYS[3] = entry key
      -- ARGV[1] = member
      -- ARGV[2] = value (bytes)
      -- ARGV[3] = ttlMs (empty => no expiry)
      -- ARGV[4] = maxSize
      -- ARGV[5] = entry key prefix of the namespace
      -- Victim entry keys share the namespace hash tag, so they live in this slot.

      if ARGV[3] ~= '' then
        redis.call('SET', KEYS[3], ARGV[2], 'PX', tonumber(ARGV[3]))
      else
        redis.call('SET', KEYS[3], ARGV[2])
      end

      local seq = redis.call('INCR', KEYS[2])
      redis.call('ZADD', KEYS[1], seq, ARGV[1])

      local overflow = redis.call('ZCARD', KEYS[1]) - tonumber(ARGV[4])
      if overflow <= 0 then
        return {}
      end

      -- Markers whose value already expired are dropped first and do not
      -- count as evictions.
      for _, member in ipairs(redis.call('ZRANGE', KEYS[1], 0, -1)) do
        if overflow <= 0 then
          break
        end
        if redis.call('EXISTS', ARGV[5] .. member) == 0 then
          redis.call('ZREM', KEYS[1], member)
          overflow = overflow - 1
        end
      end

      local victims = {}
      if overflow <= 0 then
        return victims
      end

      victims = redis.call('ZRANGE', KEYS[1], 0, overflow - 1)
      for _, member in ipairs(victims) do
        redis.call('DEL', ARGV[5] .. member)
      end
      redis.call('ZREMRANGEBYRANK', KEYS[1], 0, overflow - 1)

      return victims
    `
  }

  private membersScript(): string {
    return `
      -- KEYS[1] = recency zset
      -- ARGV[1] = entry key prefix of the namespace

      local live = {}
      for _, member in ipairs(redis.call('ZRANGE', KEYS[1], 0, -1)) do
        if redis.call('EXISTS', ARGV[1] .. member) == 1 then
          table.insert(live, member)
        else
          redis.call('ZREM', KEYS[1], member)
        end
      end

      return live
    `
  }

  private clearScript(): string {
    return `
      -- KEYS[1] = recency zset
      -- KEYS[2] = sequence counter
      -- ARGV[1] = entry key prefix of the namespace

      local members = redis.call('ZRANGE', KEYS[1], 0, -1)
      for _, member in ipairs(members) do
        redis.call('DEL', ARGV[1] .. member)
      end
      redis.call('DEL', KEYS[1], KEYS[2])

      return #members
    `
  }

  private createCacheResult(reply: unknown): CacheResult<Uint8Array> {
    if (reply === null || reply === undefined) return { kind: "miss" }

    if (reply instanceof Uint8Array) return { kind: "hit", value: new Uint8Array(reply) }

    if (typeof reply === "string") {
      return { kind: "hit", value: new Uint8Array(Buffer.from(reply, "utf8")) }
    }

    throw new TypeError(`Unexpected reply to read: ${typeof reply}`)
  }

  private asKeys(reply: unknown): CacheKey[] {
    if (!Array.isArray(reply)) {
      throw new TypeError(`Unexpected reply: expected an array, got ${typeof reply}`)
    }

    return reply.map((member: unknown) => this.asString(member))
  }

  private asString(member: unknown): string {
    if (typeof member === "string") return member
    if (member instanceof Uint8Array) return Buffer.from(member).toString("utf8")

    throw new TypeError(`Unexpected member type: ${typeof member}`)
  }

  private toTtlArg(ttlMs: number | undefined): string {
    if (ttlMs === undefined) return ""

    return String(Math.max(1, Math.ceil(ttlMs)))
  }

  private toBuffer(value: Uint8Array): Buffer {
    return Buffer.from(value.buffer, value.byteOffset, value.byteLength)
  }

  private namespaceKeys(namespace: string): NamespaceKeys {
    const base = `${this.opts.keyspacePrefix}{${namespace}}:`

    return {
      recency: `${base}recency`,
      seq: `${base}seq`,
      entryPrefix: `${base}entry:`,
    }
  }
}
