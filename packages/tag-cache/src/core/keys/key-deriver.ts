import type { CacheKey } from "../../ports/cache-key"
import type { Tag } from "../../ports/tag"
import type { TagCacheOptions } from "../../ports/tag-cache-options"
import type { TagVersionResolver } from "../versions/tag-version-resolver"
import { md5Hex } from "./hash"

export const KEY_PREFIX = "KEY_"

export type KeyDeriverDeps = {
  resolver: TagVersionResolver
}

/**
 * Folds an id and the live versions of its tags into a storage key:
 *
 * - untagged: `KEY_` + md5(id)
 * - tagged: environment + `KEY_` + md5(id + sorted(tag + version).join(""))
 */
export class KeyDeriver {
  public constructor(
    private readonly deps: KeyDeriverDeps,
    private readonly opts: TagCacheOptions,
  ) {}

  /**
   * @param tags - normalized tags, see `normalizeTags`
   */
  async derive(id: string, tags: readonly Tag[]): Promise<CacheKey> {
    if (tags.length === 0) {
      const prefix = this.opts.prefixUntaggedKeys ? this.opts.environment : ""

      return `${prefix}${KEY_PREFIX}${md5Hex(id)}`
    }

    const versions = await this.deps.resolver.resolve(tags)
    const versionedTagNames = [...versions].map(([tag, version]) => `${tag}${version}`).sort()

    return `${this.opts.environment}${KEY_PREFIX}${md5Hex(id + versionedTagNames.join(""))}`
  }
}
