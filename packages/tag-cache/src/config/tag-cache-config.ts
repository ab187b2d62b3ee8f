import type { LogLevelName } from "@tagstash/logger"

export type TagCacheConfig = {
  keys: {
    environment: string
    prefixUntaggedKeys: boolean
  }
  /**
   * Absent `url` selects the in-process store.
   */
  redis: {
    url?: string
    keyspacePrefix: string
    batchSize: number
  }
  logging: {
    level: LogLevelName
    prettify: boolean
  }
}
