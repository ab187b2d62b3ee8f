import type { KvKey } from "./kv-key"
import type { KvSetOptions } from "./kv-options"
import type { KvCounterResult, KvResult } from "./kv-result"
import type { KvEntry } from "./kv-value"

/**
 * KeyValueStore is the remote backend a cache sits in front of.
 *
 * @remarks
 * - Single-key operations are atomic; nothing is atomic across keys.
 * - Transport and backend failures reject the returned promise. Absence is
 *   never an error.
 * - The backend may evict entries at any time.
 */
export interface KeyValueStore<T> {
  get(key: KvKey): Promise<KvResult<T>>

  /**
   * Store a value, overwriting any existing one.
   */
  set(key: KvKey, value: T, opts?: Partial<KvSetOptions>): Promise<void>

  /**
   * Delete a value. Deleting an absent key is a no-op.
   */
  delete(key: KvKey): Promise<void>

  /**
   * Atomically add `by` to the integer stored under `key`.
   *
   * @remarks
   * - Resolves `not_found` when the key is absent; the key is not created.
   * - Rejects with `NotNumericValueError` when the stored value is not a
   *   non-negative integer.
   * - The entry keeps its expiration.
   */
  increment(key: KvKey, by: number): Promise<KvCounterResult>

  /**
   * Atomically subtract `by` from the integer stored under `key`, stopping at 0.
   *
   * @remarks
   * Same absence, type and expiration rules as {@link KeyValueStore.increment}.
   */
  decrement(key: KvKey, by: number): Promise<KvCounterResult>

  /**
   * Retrieve several values in as few round-trips as the backend allows.
   *
   * @remarks
   * The map holds one entry per distinct requested key.
   */
  getMany(keys: readonly KvKey[]): Promise<Map<KvKey, KvResult<T>>>

  /**
   * Store several values sharing the same write options.
   *
   * @remarks
   * Entries are applied in order, so a repeated key keeps its last value.
   */
  setMany(entries: readonly KvEntry<T>[], opts?: Partial<KvSetOptions>): Promise<void>
}
