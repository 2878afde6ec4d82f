import { createClient, RESP_TYPES } from "redis"

export type RedisEvalOptions = {
  keys: string[]
  arguments: (string | Buffer)[]
}

/**
 * The subset of a node-redis client the LRU store relies on, with bulk
 * string replies mapped to `Buffer`.
 */
export type RedisBytesClient = {
  get(key: string): Promise<Buffer | null>
  exists(keys: string | readonly string[]): Promise<number>

  eval(script: string, opts: RedisEvalOptions): Promise<unknown>

  multi(): {
    del(keys: string | readonly string[]): unknown
    zRem(key: string, members: string | readonly string[]): unknown
    exec(): Promise<unknown>
  }

  keys(pattern: string): Promise<Buffer[]>
  unlink(keys: string | readonly string[]): Promise<number>

  connect(): Promise<unknown>
  quit(): Promise<unknown>
}

export type RedisBytesClientOptions = {
  url: string

  /**
   * Milliseconds to wait for the TCP connection before failing.
   */
  connectTimeoutMs?: number
}

/**
 * Build an unconnected client. Caller owns `connect()` / `quit()`.
 */
export function createRedisClient(options: RedisBytesClientOptions): RedisBytesClient {
  return createClient({
    url: options.url,
    ...(options.connectTimeoutMs !== undefined && {
      socket: { connectTimeout: options.connectTimeoutMs },
    }),
  }).withTypeMapping({
    [RESP_TYPES.BLOB_STRING]: Buffer,
  }) as unknown as RedisBytesClient
}
