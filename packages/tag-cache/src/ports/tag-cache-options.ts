import type { Seconds } from "@tagstash/kv"

export type TagCacheOptions = {
  /**
   * Partitions tagged keys by deployment when several environments share one
   * remote store.
   *
   * @default ""
   */
  environment: string

  /**
   * Apply `environment` to untagged keys as well. Off by default so that
   * untagged keys stay shared across environments.
   *
   * @default false
   */
  prefixUntaggedKeys: boolean
}

export type TaggedOptions = {
  tags: readonly string[]
}

export type GetOptions<T> = TaggedOptions & {
  /**
   * Computes the value on a confirmed miss. The result is stored without
   * expiration and returned as a hit.
   */
  loader: () => Promise<T>
}

export type SetOptions = TaggedOptions & {
  /**
   * Expiration in seconds. Zero, a negative value or no value means the entry
   * does not expire.
   */
  ttl: Seconds
}

export type CounterOptions = TaggedOptions & {
  /**
   * Non-negative integer step.
   *
   * @default 1
   */
  by: number
}

export type SetMultiOptions = {
  ttl: Seconds
}

export type ClearTagsOptions = {
  /**
   * Create tags that do not exist remotely at version 0 instead of leaving
   * them absent.
   *
   * @default false
   */
  initializeIfMissing: boolean
}
