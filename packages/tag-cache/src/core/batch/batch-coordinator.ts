import type { KvTtl } from "@tagstash/kv"
import type { BatchItem, BatchResult, BatchResultSlot, BatchSetItem } from "../../ports/batch"
import type { CacheKey } from "../../ports/cache-key"
import type { KeyDeriver } from "../keys/key-deriver"
import { normalizeTags } from "../tags/normalize-tags"
import type { ValueCache } from "../values/value-cache"

export type BatchCoordinatorDeps<T> = {
  keys: KeyDeriver
  values: ValueCache<T>
}

type DerivedItem = {
  id: string
  tags: readonly string[]
  key: CacheKey
}

/**
 * Multi-item reads and writes with one remote round-trip each.
 */
export class BatchCoordinator<T> {
  public constructor(private readonly deps: BatchCoordinatorDeps<T>) {}

  /**
   * Items resolving to the same key collapse into one entry; the later value
   * wins.
   */
  async setMany(items: readonly BatchSetItem<T>[], ttl?: KvTtl): Promise<void> {
    const entries = new Map<CacheKey, T>()

    for (const item of items) {
      const key = await this.deps.keys.derive(item.id, normalizeTags(item.tags ?? []))

      entries.delete(key)
      entries.set(key, item.value)
    }

    await this.deps.values.setMany([...entries], ttl)
  }

  /**
   * Results indexed by id, in submission order. An id submitted more than once
   * yields a `multiple` slot; items sharing a derived key share its value.
   */
  async getMany(items: readonly BatchItem[]): Promise<Map<string, BatchResultSlot<T>>> {
    const slots = new Map<string, BatchResultSlot<T>>()
    if (items.length === 0) return slots

    const derived = await this.deriveAll(items)
    const fetched = await this.deps.values.getMany(derived.map((item) => item.key))

    for (const item of derived) {
      const result: BatchResult<T> = {
        ...item,
        result: fetched.get(item.key) ?? { kind: "miss" },
      }

      slots.set(item.id, this.addToSlot(slots.get(item.id), result))
    }

    return slots
  }

  private async deriveAll(items: readonly BatchItem[]): Promise<DerivedItem[]> {
    const derived: DerivedItem[] = []

    for (const item of items) {
      const tags = item.tags ?? []
      const key = await this.deps.keys.derive(item.id, normalizeTags(tags))

      derived.push({ id: item.id, tags, key })
    }

    return derived
  }

  private addToSlot(
    slot: BatchResultSlot<T> | undefined,
    result: BatchResult<T>,
  ): BatchResultSlot<T> {
    if (!slot) return { kind: "single", result }

    if (slot.kind === "single") return { kind: "multiple", results: [slot.result, result] }

    slot.results.push(result)

    return slot
  }
}
