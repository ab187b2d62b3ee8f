import { createClient, RESP_TYPES, type RedisClientOptions } from "redis"

export type RedisTtl = { EX: number } | { PX: number }

export type RedisEvalOptions = { keys: string[]; arguments: string[] }

/**
 * The slice of a node-redis client the adapter uses, with bulk strings mapped
 * to `Buffer`.
 */
export type RedisBytesClient = {
  get(key: string): Promise<Buffer | null>
  mGet(keys: readonly string[]): Promise<(Buffer | null)[]>

  quit(): Promise<void>
  connect(): Promise<unknown>
  isOpen: boolean

  set(key: string, value: Uint8Array | Buffer, opts?: RedisTtl): Promise<unknown>

  del(keys: string | readonly string[]): Promise<number>

  eval(script: string, opts: RedisEvalOptions): Promise<unknown>

  multi(): {
    set(key: string, value: Uint8Array | Buffer, opts?: RedisTtl): unknown
    exec(): Promise<unknown>
  }
}

export type RedisBytesClientOptions = { url: string } & Omit<RedisClientOptions, "url">

/**
 * Creates an unconnected client. The caller owns `connect()` and `quit()`.
 */
export function createRedisBytesClient(options: RedisBytesClientOptions): RedisBytesClient {
  return createClient({ ...options, url: options.url }).withTypeMapping({
    [RESP_TYPES.BLOB_STRING]: Buffer,
  }) as unknown as RedisBytesClient
}
