import type { KeyValueStore } from "@tagstash/kv"
import type { Logger } from "@tagstash/logger"
import type { Tag, TagVersion } from "../../ports/tag"
import type { ClearTagsOptions } from "../../ports/tag-cache-options"
import type { TagClearance } from "../../ports/tag-clearance"
import { remoteCall } from "../remote-call"
import type { TagVersionResolver } from "../versions/tag-version-resolver"
import { normalizeTags } from "./normalize-tags"
import { tagVersionKey } from "./tag-version-key"

export type TagInvalidatorDeps = {
  versions: KeyValueStore<TagVersion>
  resolver: TagVersionResolver
  logger: Logger
}

export class TagInvalidator {
  public constructor(private readonly deps: TagInvalidatorDeps) {}

  /**
   * Increment the remote version of each tag and mirror the result.
   *
   * @remarks
   * Tags are cleared one at a time. A remote failure rejects; tags cleared
   * before it stay cleared and later tags are not attempted.
   */
  async clearTags(
    rawTags: readonly string[],
    opts: Partial<ClearTagsOptions> = {},
  ): Promise<TagClearance[]> {
    const initializeIfMissing = opts.initializeIfMissing ?? false
    const cleared: TagClearance[] = []

    for (const tag of normalizeTags(rawTags)) {
      const clearance = await this.clearTag(tag, initializeIfMissing)

      this.deps.logger.debug("Cleared tag", { tags: [tag], outcome: clearance.outcome })
      cleared.push(clearance)
    }

    return cleared
  }

  private async clearTag(tag: Tag, initializeIfMissing: boolean): Promise<TagClearance> {
    const key = tagVersionKey(tag)
    const res = await remoteCall("increment", { key, tags: [tag] }, () =>
      this.deps.versions.increment(key, 1),
    )

    if (res.kind === "updated") {
      this.deps.resolver.mirror(tag, res.value)

      return { tag, outcome: "bumped", version: res.value }
    }

    if (initializeIfMissing) {
      await remoteCall("set", { key, tags: [tag] }, () => this.deps.versions.set(key, 0))
      this.deps.resolver.mirror(tag, 0)

      return { tag, outcome: "initialized", version: 0 }
    }

    // Absent remotely: a mirrored version is bumped so this client stops
    // reading entries keyed under it. An unmirrored tag stays unset.
    const localVersion = this.deps.resolver.bump(tag)

    return localVersion === undefined
      ? { tag, outcome: "missing" }
      : { tag, outcome: "missing", localVersion }
  }
}
