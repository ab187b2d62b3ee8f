import {
  applyCounterDelta,
  assertCounterStep,
  formatCounter,
  parseCounter,
} from "../../core/counter/counter-value"
import { NotNumericValueError } from "../../core/errors"
import type { Clock } from "../../core/time/clock"
import type { BytesKeyValueStore } from "../../ports/bytes-kv-store"
import type { KvKey } from "../../ports/kv-key"
import type { KvSetOptions, KvTtl } from "../../ports/kv-options"
import type { KvCounterResult, KvResult } from "../../ports/kv-result"
import type { KvEntry } from "../../ports/kv-value"
import type { Milliseconds } from "../../ports/time"

export type MemoryKvStoreOptions = {
  /**
   * Maximum number of entries retained in the store.
   *
   * When set, writes that would add a key beyond the limit throw.
   */
  maxEntries?: number
}

export type MemoryKvStoreDeps = {
  clock: Clock
}

export type MemoryKvStoreEntry = {
  value: Uint8Array
  expiresAtMs?: Milliseconds
}

/**
 * In-process remote store, for tests and single-process deployments.
 */
export class MemoryBytesKeyValueStore implements BytesKeyValueStore {
  private readonly store = new Map<KvKey, MemoryKvStoreEntry>()

  public constructor(
    private readonly deps: MemoryKvStoreDeps,
    private readonly opts: MemoryKvStoreOptions = {},
  ) {}

  async get(key: KvKey): Promise<KvResult<Uint8Array>> {
    const entry = this.live(key)
    if (!entry) return { kind: "not_found" }

    return { kind: "found", value: new Uint8Array(entry.value) }
  }

  async set(key: KvKey, value: Uint8Array, opts?: Partial<KvSetOptions>): Promise<void> {
    this.write(key, value, opts?.ttl)
  }

  async delete(key: KvKey): Promise<void> {
    this.store.delete(key)
  }

  async increment(key: KvKey, by: number): Promise<KvCounterResult> {
    assertCounterStep(by)

    return this.updateCounter(key, by)
  }

  async decrement(key: KvKey, by: number): Promise<KvCounterResult> {
    assertCounterStep(by)

    return this.updateCounter(key, -by)
  }

  async getMany(keys: readonly KvKey[]): Promise<Map<KvKey, KvResult<Uint8Array>>> {
    const out = new Map<KvKey, KvResult<Uint8Array>>()

    for (const key of keys) {
      out.set(key, await this.get(key))
    }

    return out
  }

  async setMany(
    entries: readonly KvEntry<Uint8Array>[],
    opts?: Partial<KvSetOptions>,
  ): Promise<void> {
    this.ensureCapacityFor(entries.map(([key]) => key))

    for (const [key, value] of entries) {
      this.write(key, value, opts?.ttl)
    }
  }

  get size(): number {
    this.purgeExpired()

    return this.store.size
  }

  private updateCounter(key: KvKey, delta: number): KvCounterResult {
    const entry = this.live(key)
    if (!entry) return { kind: "not_found" }

    const current = parseCounter(entry.value)
    if (current === undefined) throw new NotNumericValueError(key)

    const value = applyCounterDelta(current, delta)

    this.store.set(key, { ...entry, value: formatCounter(value) })

    return { kind: "updated", value }
  }

  private write(key: KvKey, value: Uint8Array, ttl?: KvTtl): void {
    this.ensureCapacityFor([key])

    const expiresAtMs = this.computeExpiresAt(ttl)

    this.store.set(key, {
      value: new Uint8Array(value),
      ...(expiresAtMs !== undefined && { expiresAtMs }),
    })
  }

  private live(key: KvKey): MemoryKvStoreEntry | undefined {
    const entry = this.store.get(key)
    if (!entry) return undefined

    if (this.isExpired(entry)) {
      this.store.delete(key)
      return undefined
    }

    return entry
  }

  private ensureCapacityFor(keys: readonly KvKey[]): void {
    if (this.opts.maxEntries === undefined) return

    const added = new Set(keys.filter((key) => !this.store.has(key)))
    if (added.size === 0) return

    this.purgeExpired()

    const missing = [...added].filter((key) => !this.store.has(key)).length

    if (this.store.size + missing > this.opts.maxEntries) {
      throw new RangeError(
        `MemoryBytesKeyValueStore: max entries (${this.opts.maxEntries}) exceeded`,
      )
    }
  }

  private purgeExpired(): void {
    for (const [key, entry] of this.store) {
      if (this.isExpired(entry)) {
        this.store.delete(key)
      }
    }
  }

  private isExpired(entry: MemoryKvStoreEntry): boolean {
    if (entry.expiresAtMs === undefined) return false

    return this.deps.clock.nowMs() >= entry.expiresAtMs
  }

  private computeExpiresAt(ttl?: KvTtl): Milliseconds | undefined {
    if (!ttl) return undefined

    const ms = ttl.kind === "seconds" ? ttl.seconds * 1000 : ttl.milliseconds
    if (ms <= 0) return undefined

    return this.deps.clock.nowMs() + ms
  }
}
