export {
  createMemoryBytesKeyValueStore,
  type MemoryKvBundleOptions,
} from "./adapters/memory/create"
export {
  MemoryBytesKeyValueStore,
  type MemoryKvStoreOptions,
} from "./adapters/memory/memory-bytes-kv-store"
export {
  createRedisBytesKeyValueStore,
  type RedisKvBundleOptions,
} from "./adapters/redis/create"
export {
  RedisBytesKeyValueStore,
  type RedisKvStoreOptions,
} from "./adapters/redis/redis-bytes-kv-store"
export {
  createRedisBytesClient,
  type RedisBytesClient,
  type RedisBytesClientOptions,
} from "./adapters/redis/redis-client"
export { CodecKeyValueStore, createCodecKeyValueStore } from "./core/codec/codec-kv-store"
export { assertCounterStep } from "./core/counter/counter-value"
export { integerCodec } from "./core/codec/integer-codec"
export { jsonCodec, superjsonCodec } from "./core/codec/json-codec"
export { type CodecDirection, NotNumericValueError, ValueCodecError } from "./core/errors"
export { type Clock, SystemClock } from "./core/time/clock"
export type { BytesKeyValueStore } from "./ports/bytes-kv-store"
export type { Codec } from "./ports/codec"
export type { KeyspacePrefix } from "./ports/keyspace-prefix"
export type { KvKey } from "./ports/kv-key"
export type { KvSetOptions, KvTtl } from "./ports/kv-options"
export type { KvCounterResult, KvFound, KvNotFound, KvResult } from "./ports/kv-result"
export type { KeyValueStore } from "./ports/kv-store"
export type { KvEntry } from "./ports/kv-value"
export type { Milliseconds, Seconds } from "./ports/time"
