import { type Clock, SystemClock } from "../../core/time/clock"
import { MemoryBytesKeyValueStore, type MemoryKvStoreOptions } from "./memory-bytes-kv-store"

export type MemoryKvBundleOptions = {
  clock?: Clock
  opts?: MemoryKvStoreOptions
}

export function createMemoryBytesKeyValueStore(
  options: MemoryKvBundleOptions = {},
): MemoryBytesKeyValueStore {
  return new MemoryBytesKeyValueStore(
    { clock: options.clock ?? new SystemClock() },
    options.opts,
  )
}
