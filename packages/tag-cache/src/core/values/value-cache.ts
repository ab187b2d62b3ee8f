import type {
  KeyValueStore,
  KvCounterResult,
  KvEntry,
  KvSetOptions,
  KvTtl,
} from "@tagstash/kv"
import type { Logger } from "@tagstash/logger"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheResult } from "../../ports/cache-result"
import { remoteCall } from "../remote-call"

export type ValueCacheDeps<T> = {
  store: KeyValueStore<T>
  logger: Logger
}

/**
 * Local-first memo of values by storage key, written through to the remote
 * store.
 *
 * @remarks
 * - Values are memoized only after the remote call succeeded and only for
 *   found entries.
 * - Batch reads always go to the remote store.
 * - Counter updates and deletes evict, since the new value is not known
 *   locally.
 * - Remote failures reject with `RemoteUnavailableError`.
 */
export class ValueCache<T> {
  private readonly local = new Map<CacheKey, { value: T }>()

  public constructor(private readonly deps: ValueCacheDeps<T>) {}

  /**
   * Local hit, else remote read. On a confirmed miss `loader` computes the
   * value, which is stored without expiration and returned as a hit.
   *
   * @remarks
   * Only the remote read rejects with `RemoteUnavailableError`; stored bytes
   * the codec cannot read reject with `ValueCodecError`. Errors thrown by
   * `loader` propagate unchanged; a failed write of the loaded value is
   * logged and the value is still returned.
   */
  async get(key: CacheKey, loader?: () => Promise<T>): Promise<CacheResult<T>> {
    const cached = await this.lookup(key)
    if (cached.kind === "hit" || !loader) return cached

    const value = await loader()

    try {
      await remoteCall("set", { key }, () => this.deps.store.set(key, value))
      this.local.set(key, { value })
    } catch (err) {
      this.deps.logger.warn("Failed to store loaded value", { key, err })
    }

    return { kind: "hit", value }
  }

  /**
   * One remote read over the distinct keys; the local memo is refreshed from
   * the result, never consulted.
   */
  async getMany(keys: readonly CacheKey[]): Promise<Map<CacheKey, CacheResult<T>>> {
    const out = new Map<CacheKey, CacheResult<T>>()
    const distinct = [...new Set(keys)]
    if (distinct.length === 0) return out

    const fetched = await remoteCall("getMany", { keys: distinct }, () =>
      this.deps.store.getMany(distinct),
    )

    for (const key of distinct) {
      const res = fetched.get(key)

      if (res?.kind === "found") {
        this.local.set(key, { value: res.value })
        out.set(key, { kind: "hit", value: res.value })
      } else {
        this.local.delete(key)
        out.set(key, { kind: "miss" })
      }
    }

    return out
  }

  async set(key: CacheKey, value: T, ttl?: KvTtl): Promise<void> {
    await remoteCall("set", { key }, () =>
      this.deps.store.set(key, value, this.writeOptions(ttl)),
    )

    this.local.set(key, { value })
  }

  /**
   * @remarks
   * A key repeated in `entries` keeps its last value, remotely and locally.
   */
  async setMany(entries: readonly KvEntry<T>[], ttl?: KvTtl): Promise<void> {
    if (entries.length === 0) return

    await remoteCall("setMany", { keys: entries.map(([key]) => key) }, () =>
      this.deps.store.setMany(entries, this.writeOptions(ttl)),
    )

    for (const [key, value] of entries) {
      this.local.set(key, { value })
    }
  }

  async delete(key: CacheKey): Promise<void> {
    this.local.delete(key)

    await remoteCall("delete", { key }, () => this.deps.store.delete(key))
  }

  async increment(key: CacheKey, by: number): Promise<KvCounterResult> {
    this.local.delete(key)

    return remoteCall("increment", { key }, () => this.deps.store.increment(key, by))
  }

  async decrement(key: CacheKey, by: number): Promise<KvCounterResult> {
    this.local.delete(key)

    return remoteCall("decrement", { key }, () => this.deps.store.decrement(key, by))
  }

  reset(): void {
    this.local.clear()
  }

  private async lookup(key: CacheKey): Promise<CacheResult<T>> {
    const memo = this.local.get(key)
    if (memo) return { kind: "hit", value: memo.value }

    const res = await remoteCall("get", { key }, () => this.deps.store.get(key))
    if (res.kind === "not_found") return { kind: "miss" }

    this.local.set(key, { value: res.value })

    return { kind: "hit", value: res.value }
  }

  private writeOptions(ttl: KvTtl | undefined): Partial<KvSetOptions> {
    return ttl ? { ttl } : {}
  }
}
