import { type ConfigSource, DotenvSource, EnvSource, loadConfig } from "@tagstash/config"
import { TAG_CACHE_ENV_PREFIX, type TagCacheEnv, tagCacheEnvSchema } from "./schema"
import type { TagCacheConfig } from "./tag-cache-config"

export function mapEnvToConfig(env: TagCacheEnv): TagCacheConfig {
  return {
    keys: {
      environment: env.ENVIRONMENT,
      prefixUntaggedKeys: env.PREFIX_UNTAGGED_KEYS,
    },
    redis: {
      keyspacePrefix: env.KEYSPACE_PREFIX,
      batchSize: env.BATCH_SIZE,
      ...(env.REDIS_URL !== undefined && { url: env.REDIS_URL }),
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
    },
  }
}

export type LoadTagCacheConfigOptions = {
  /**
   * Replaces the default sources: `.env` in `cwd` (optional), then the
   * process environment, both under the `TAGSTASH_` prefix.
   */
  sources?: readonly ConfigSource[]
  env?: Record<string, string | undefined>
  cwd?: string
}

export async function loadTagCacheConfig(
  options: LoadTagCacheConfigOptions = {},
): Promise<TagCacheConfig> {
  const sources = options.sources ?? [
    new DotenvSource({
      file: ".env",
      required: false,
      prefix: TAG_CACHE_ENV_PREFIX,
      ...(options.cwd !== undefined && { cwd: options.cwd }),
    }),
    new EnvSource({
      prefix: TAG_CACHE_ENV_PREFIX,
      ...(options.env !== undefined && { env: options.env }),
    }),
  ]

  const config = await loadConfig({ schema: tagCacheEnvSchema, sources })

  return mapEnvToConfig(config.value)
}
