import {
  type BytesKeyValueStore,
  type Clock,
  type Codec,
  createCodecKeyValueStore,
  createMemoryBytesKeyValueStore,
  createRedisBytesClient,
  createRedisBytesKeyValueStore,
  integerCodec,
  jsonCodec,
  type KeyspacePrefix,
  type RedisBytesClient,
} from "@tagstash/kv"
import { createPinoLogger, type Logger } from "@tagstash/logger"
import type { TagCacheConfig } from "./config/tag-cache-config"
import { TagCache } from "./core/tag-cache"
import type { TagCacheOptions } from "./ports/tag-cache-options"

export type CreateTagCacheOptions<T> = Partial<TagCacheOptions> & {
  bytesStore: BytesKeyValueStore
  /**
   * Value codec. Integers must encode as decimal text for counters to work.
   *
   * @default jsonCodec()
   */
  codec?: Codec<T>
  logger?: Logger
}

/**
 * Values and tag versions share `bytesStore`; versions are stored as decimal
 * integers under `TAG_<tag>`.
 */
export function createTagCache<T>(options: CreateTagCacheOptions<T>): TagCache<T> {
  const { bytesStore, codec, logger, ...opts } = options

  return new TagCache<T>(
    {
      values: createCodecKeyValueStore({ bytesStore, codec: codec ?? jsonCodec<T>() }),
      versions: createCodecKeyValueStore({ bytesStore, codec: integerCodec() }),
      ...(logger !== undefined && { logger }),
    },
    opts,
  )
}

export type CreateMemoryTagCacheOptions<T> = Omit<CreateTagCacheOptions<T>, "bytesStore"> & {
  clock?: Clock
  maxEntries?: number
}

export function createMemoryTagCache<T>(
  options: CreateMemoryTagCacheOptions<T> = {},
): TagCache<T> {
  const { clock, maxEntries, ...rest } = options

  const bytesStore = createMemoryBytesKeyValueStore({
    ...(clock !== undefined && { clock }),
    ...(maxEntries !== undefined && { opts: { maxEntries } }),
  })

  return createTagCache<T>({ ...rest, bytesStore })
}

export type CreateRedisTagCacheOptions<T> = Omit<CreateTagCacheOptions<T>, "bytesStore"> & {
  client: RedisBytesClient
  keyspacePrefix: KeyspacePrefix
  batchSize: number
}

/**
 * @remarks
 * The caller owns `client.connect()` / `client.quit()`.
 */
export function createRedisTagCache<T>(options: CreateRedisTagCacheOptions<T>): TagCache<T> {
  const { client, keyspacePrefix, batchSize, ...rest } = options

  const bytesStore = createRedisBytesKeyValueStore({
    client,
    opts: { keyspacePrefix, batchSize },
  })

  return createTagCache<T>({ ...rest, bytesStore })
}

export type OpenedTagCache<T> = {
  cache: TagCache<T>
  logger: Logger
  /**
   * Releases the redis connection, if any.
   */
  close(): Promise<void>
}

export type OpenTagCacheOptions<T> = {
  codec?: Codec<T>
  logger?: Logger
}

/**
 * Build a cache from loaded configuration: redis when a URL is configured,
 * the in-process store otherwise.
 */
export async function openTagCache<T>(
  config: TagCacheConfig,
  options: OpenTagCacheOptions<T> = {},
): Promise<OpenedTagCache<T>> {
  const logger =
    options.logger ??
    createPinoLogger({}, config.logging, {
      service: "tagstash",
      environment: config.keys.environment,
    })

  const shared = {
    ...config.keys,
    logger,
    ...(options.codec !== undefined && { codec: options.codec }),
  }

  const url = config.redis.url
  if (url === undefined) {
    return { cache: createMemoryTagCache<T>(shared), logger, close: async () => {} }
  }

  const client = createRedisBytesClient({ url })
  await client.connect()

  logger.info("Connected to redis", { keyspacePrefix: config.redis.keyspacePrefix })

  return {
    cache: createRedisTagCache<T>({
      ...shared,
      client,
      keyspacePrefix: config.redis.keyspacePrefix,
      batchSize: config.redis.batchSize,
    }),
    logger,
    close: async () => {
      if (client.isOpen) await client.quit()
    },
  }
}
