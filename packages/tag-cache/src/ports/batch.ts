import type { CacheKey } from "./cache-key"
import type { CacheResult } from "./cache-result"

export type BatchItem = {
  id: string
  tags?: readonly string[]
}

export type BatchSetItem<T> = BatchItem & {
  value: T
}

/**
 * One submitted item echoed back with its derived key and lookup outcome.
 */
export type BatchResult<T> = {
  id: string
  tags: readonly string[]
  key: CacheKey
  result: CacheResult<T>
}

/**
 * Results grouped by id. Ids are not unique (id plus tags is), so an id that
 * was submitted more than once maps to all of its results in submission order.
 */
export type BatchResultSlot<T> =
  | { kind: "single"; result: BatchResult<T> }
  | { kind: "multiple"; results: BatchResult<T>[] }
