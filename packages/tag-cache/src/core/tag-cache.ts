import { toAppError } from "@tagstash/errors"
import {
  assertCounterStep,
  type KeyValueStore,
  type KvCounterResult,
  type KvTtl,
  type Seconds,
  ValueCodecError,
} from "@tagstash/kv"
import { createNullLogger, type Logger } from "@tagstash/logger"
import type { BatchItem, BatchResultSlot, BatchSetItem } from "../ports/batch"
import type { CacheKey } from "../ports/cache-key"
import type { CacheResult } from "../ports/cache-result"
import type { CounterResult } from "../ports/counter-result"
import type { TagVersion } from "../ports/tag"
import type { TagCacheClient } from "../ports/tag-cache"
import type {
  ClearTagsOptions,
  CounterOptions,
  GetOptions,
  SetMultiOptions,
  SetOptions,
  TagCacheOptions,
  TaggedOptions,
} from "../ports/tag-cache-options"
import type { TagClearance } from "../ports/tag-clearance"
import { BatchCoordinator } from "./batch/batch-coordinator"
import { RemoteUnavailableError, VersionStoreInconsistencyError } from "./errors"
import { KeyDeriver } from "./keys/key-deriver"
import { normalizeTags } from "./tags/normalize-tags"
import { TagInvalidator } from "./tags/tag-invalidator"
import { ValueCache } from "./values/value-cache"
import { TagVersionResolver } from "./versions/tag-version-resolver"

export type TagCacheDeps<T> = {
  /** Store for cached values. */
  values: KeyValueStore<T>

  /** Store for tag versions; usually the same backend with an integer codec. */
  versions: KeyValueStore<TagVersion>

  logger?: Logger
}

type CounterOperation = "increment" | "decrement"

export class TagCache<T> implements TagCacheClient<T> {
  private readonly logger: Logger
  private readonly resolver: TagVersionResolver
  private readonly keys: KeyDeriver
  private readonly values: ValueCache<T>
  private readonly batches: BatchCoordinator<T>
  private readonly invalidator: TagInvalidator

  public constructor(deps: TagCacheDeps<T>, opts: Partial<TagCacheOptions> = {}) {
    this.logger = (deps.logger ?? createNullLogger()).child({ module: "tag-cache" })

    this.resolver = new TagVersionResolver({
      versions: deps.versions,
      logger: this.logger.child({ module: "tag-version-resolver" }),
    })
    this.keys = new KeyDeriver(
      { resolver: this.resolver },
      {
        environment: opts.environment ?? "",
        prefixUntaggedKeys: opts.prefixUntaggedKeys ?? false,
      },
    )
    this.values = new ValueCache({
      store: deps.values,
      logger: this.logger.child({ module: "value-cache" }),
    })
    this.batches = new BatchCoordinator({ keys: this.keys, values: this.values })
    this.invalidator = new TagInvalidator({
      versions: deps.versions,
      resolver: this.resolver,
      logger: this.logger.child({ module: "tag-invalidator" }),
    })
  }

  async get(id: string, opts: Partial<GetOptions<T>> = {}): Promise<CacheResult<T>> {
    try {
      const key = await this.deriveKey(id, opts.tags)

      return await this.values.get(key, opts.loader)
    } catch (err) {
      if (err instanceof RemoteUnavailableError) {
        this.logger.warn("Cache read failed, reporting a miss", {
          op: "get",
          id,
          tags: opts.tags,
          err,
        })

        return { kind: "miss" }
      }

      if (err instanceof ValueCodecError) {
        this.logger.warn("Cached value is unreadable, reporting a miss", {
          op: "get",
          id,
          tags: opts.tags,
          err,
        })

        return { kind: "miss" }
      }

      throw err
    }
  }

  async set(id: string, value: T, opts: Partial<SetOptions> = {}): Promise<boolean> {
    try {
      const key = await this.deriveKey(id, opts.tags)
      await this.values.set(key, value, this.toKvTtl(opts.ttl))

      return true
    } catch (err) {
      return this.reportWriteFailure("set", id, opts.tags, err)
    }
  }

  async increment(id: string, opts: Partial<CounterOptions> = {}): Promise<CounterResult> {
    return this.updateCounter("increment", id, opts)
  }

  async decrement(id: string, opts: Partial<CounterOptions> = {}): Promise<CounterResult> {
    return this.updateCounter("decrement", id, opts)
  }

  async delete(id: string, opts: Partial<TaggedOptions> = {}): Promise<boolean> {
    try {
      await this.values.delete(await this.deriveKey(id, opts.tags))

      return true
    } catch (err) {
      return this.reportWriteFailure("delete", id, opts.tags, err)
    }
  }

  async getMulti(items: readonly BatchItem[]): Promise<Map<string, BatchResultSlot<T>>> {
    return this.batches.getMany(items)
  }

  async setMulti(
    items: readonly BatchSetItem<T>[],
    opts: Partial<SetMultiOptions> = {},
  ): Promise<void> {
    await this.batches.setMany(items, this.toKvTtl(opts.ttl))
  }

  async deriveKey(id: string, tags: readonly string[] = []): Promise<CacheKey> {
    return this.keys.derive(id, normalizeTags(tags))
  }

  async clearTags(
    tags: readonly string[],
    opts: Partial<ClearTagsOptions> = {},
  ): Promise<TagClearance[]> {
    return this.invalidator.clearTags(tags, opts)
  }

  resetValueCache(): void {
    this.values.reset()
  }

  resetLocalCaches(): void {
    this.values.reset()
    this.resolver.reset()
  }

  private async updateCounter(
    op: CounterOperation,
    id: string,
    opts: Partial<CounterOptions>,
  ): Promise<CounterResult> {
    const by = opts.by ?? 1
    assertCounterStep(by)

    let res: KvCounterResult
    try {
      const key = await this.deriveKey(id, opts.tags)

      res =
        op === "increment"
          ? await this.values.increment(key, by)
          : await this.values.decrement(key, by)
    } catch (err) {
      if (err instanceof VersionStoreInconsistencyError) throw err

      const error = toAppError(err)
      this.logger.warn("Counter update failed", { op, id, tags: opts.tags, err: error })

      return { kind: "failed", error }
    }

    return res.kind === "updated" ? { kind: "updated", value: res.value } : { kind: "missing" }
  }

  /**
   * Single-item writes report failures as `false`; only a version store that
   * could not be initialized escapes.
   */
  private reportWriteFailure(
    op: "set" | "delete",
    id: string,
    tags: readonly string[] | undefined,
    err: unknown,
  ): false {
    if (err instanceof VersionStoreInconsistencyError) throw err

    this.logger.warn(`Cache ${op} failed`, { op, id, tags, err })

    return false
  }

  private toKvTtl(ttl: Seconds | undefined): KvTtl | undefined {
    if (ttl === undefined || ttl <= 0) return undefined

    return { kind: "seconds", seconds: ttl }
  }
}
