import type { BatchItem, BatchResultSlot, BatchSetItem } from "./batch"
import type { CacheKey } from "./cache-key"
import type { CacheResult } from "./cache-result"
import type { CounterResult } from "./counter-result"
import type { TagClearance } from "./tag-clearance"
import type {
  ClearTagsOptions,
  CounterOptions,
  GetOptions,
  SetMultiOptions,
  SetOptions,
  TaggedOptions,
} from "./tag-cache-options"

/**
 * Cache whose entries can be invalidated in groups by tag.
 *
 * @remarks
 * An entry is addressed by its id plus its tag set; tag order and case do not
 * matter. Reading with a different tag set than the one used for writing is a
 * miss.
 *
 * Single-item operations report remote failures in their result: `get`
 * misses, `set` and `delete` return `false`, counters return `failed`. Batch
 * operations and tag clears reject. Every operation rejects with
 * `VersionStoreInconsistencyError` when new tags cannot be initialized.
 */
export interface TagCacheClient<T> {
  get(id: string, opts?: Partial<GetOptions<T>>): Promise<CacheResult<T>>

  /**
   * @returns `false` when the remote write failed
   */
  set(id: string, value: T, opts?: Partial<SetOptions>): Promise<boolean>

  increment(id: string, opts?: Partial<CounterOptions>): Promise<CounterResult>

  /**
   * Like {@link TagCacheClient.increment}, stopping at 0.
   */
  decrement(id: string, opts?: Partial<CounterOptions>): Promise<CounterResult>

  delete(id: string, opts?: Partial<TaggedOptions>): Promise<boolean>

  getMulti(items: readonly BatchItem[]): Promise<Map<string, BatchResultSlot<T>>>

  setMulti(items: readonly BatchSetItem<T>[], opts?: Partial<SetMultiOptions>): Promise<void>

  deriveKey(id: string, tags?: readonly string[]): Promise<CacheKey>

  /**
   * Bump the version of every tag, orphaning all entries stored under the
   * previous versions. Tags are processed one by one; there is no atomicity
   * across tags.
   */
  clearTags(tags: readonly string[], opts?: Partial<ClearTagsOptions>): Promise<TagClearance[]>

  /**
   * Forget locally memoized values.
   */
  resetValueCache(): void

  /**
   * Forget locally memoized values and tag versions. The next operation
   * re-reads versions from the remote store.
   */
  resetLocalCaches(): void
}
