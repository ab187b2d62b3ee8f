import { logLevelNames } from "@tagstash/logger"
import { z } from "zod/mini"

export const TAG_CACHE_ENV_PREFIX = "TAGSTASH_"

/**
 * Variables read under {@link TAG_CACHE_ENV_PREFIX}, e.g. `TAGSTASH_REDIS_URL`.
 */
export const tagCacheEnvSchema = z.object({
  ENVIRONMENT: z._default(z.string(), ""),
  PREFIX_UNTAGGED_KEYS: z._default(z.stringbool(), false),

  REDIS_URL: z.optional(z.url()),
  KEYSPACE_PREFIX: z._default(z.string(), "tagstash:"),
  BATCH_SIZE: z._default(
    z.coerce.number().check(
      z.gte(1),
      z.refine((n) => Number.isInteger(n), "BATCH_SIZE must be an integer"),
    ),
    1000,
  ),

  LOG_LEVEL: z._default(z.enum(logLevelNames), "info"),
  LOG_PRETTY: z._default(z.stringbool(), false),
})

export type TagCacheEnv = z.infer<typeof tagCacheEnvSchema>
