import type { KvKey } from "@tagstash/kv"
import type { Tag } from "../../ports/tag"

export const TAG_PREFIX = "TAG_"

export function tagVersionKey(tag: Tag): KvKey {
  return `${TAG_PREFIX}${tag}`
}
