import { RedisBytesKeyValueStore, type RedisKvStoreOptions } from "./redis-bytes-kv-store"
import type { RedisBytesClient } from "./redis-client"

export type RedisKvBundleOptions = {
  client: RedisBytesClient
  opts: RedisKvStoreOptions
}

/**
 * @remarks
 * The caller owns `client.connect()` / `client.quit()`.
 */
export function createRedisBytesKeyValueStore(
  options: RedisKvBundleOptions,
): RedisBytesKeyValueStore {
  return new RedisBytesKeyValueStore(options.client, options.opts)
}
