export { loadTagCacheConfig, mapEnvToConfig } from "./config/load-tag-cache-config"
export type { LoadTagCacheConfigOptions } from "./config/load-tag-cache-config"
export { TAG_CACHE_ENV_PREFIX, type TagCacheEnv, tagCacheEnvSchema } from "./config/schema"
export type { TagCacheConfig } from "./config/tag-cache-config"
export { BatchCoordinator } from "./core/batch/batch-coordinator"
export { RemoteUnavailableError, VersionStoreInconsistencyError } from "./core/errors"
export { KEY_PREFIX, KeyDeriver } from "./core/keys/key-deriver"
export { TagCache, type TagCacheDeps } from "./core/tag-cache"
export { isPresentTag, normalizeTags, sanitizeTag } from "./core/tags/normalize-tags"
export { TagInvalidator } from "./core/tags/tag-invalidator"
export { TAG_PREFIX, tagVersionKey } from "./core/tags/tag-version-key"
export { ValueCache } from "./core/values/value-cache"
export { TagVersionResolver } from "./core/versions/tag-version-resolver"
export {
  type CreateMemoryTagCacheOptions,
  type CreateRedisTagCacheOptions,
  type CreateTagCacheOptions,
  createMemoryTagCache,
  createRedisTagCache,
  createTagCache,
  type OpenedTagCache,
  type OpenTagCacheOptions,
  openTagCache,
} from "./create"
export type { BatchItem, BatchResult, BatchResultSlot, BatchSetItem } from "./ports/batch"
export type { CacheKey } from "./ports/cache-key"
export type { CacheHit, CacheMiss, CacheResult } from "./ports/cache-result"
export type {
  CounterFailed,
  CounterMissing,
  CounterResult,
  CounterUpdated,
} from "./ports/counter-result"
export type { Tag, TagVersion } from "./ports/tag"
export type { TagCacheClient } from "./ports/tag-cache"
export type {
  ClearTagsOptions,
  CounterOptions,
  GetOptions,
  SetMultiOptions,
  SetOptions,
  TagCacheOptions,
  TaggedOptions,
} from "./ports/tag-cache-options"
export type { TagClearance } from "./ports/tag-clearance"
