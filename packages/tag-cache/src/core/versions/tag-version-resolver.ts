import type { KeyValueStore, KvEntry } from "@tagstash/kv"
import type { Logger } from "@tagstash/logger"
import type { Tag, TagVersion } from "../../ports/tag"
import { VersionStoreInconsistencyError } from "../errors"
import { remoteCall } from "../remote-call"
import { tagVersionKey } from "../tags/tag-version-key"

export type TagVersionResolverDeps = {
  versions: KeyValueStore<TagVersion>
  logger: Logger
}

/**
 * Resolves live tag versions through a local mirror.
 *
 * @remarks
 * Mirrored versions are trusted until {@link TagVersionResolver.reset}. Misses
 * are fetched in one `getMany`; tags absent remotely are created at version 0
 * with one `setMany`. Concurrent resolves that miss on the same tag share a
 * single in-flight fetch, so a new tag is initialized once per client.
 */
export class TagVersionResolver {
  private readonly mirrored = new Map<Tag, TagVersion>()
  private readonly flights = new Map<Tag, Promise<TagVersion>>()

  public constructor(private readonly deps: TagVersionResolverDeps) {}

  async resolve(tags: readonly Tag[]): Promise<Map<Tag, TagVersion>> {
    const out = new Map<Tag, TagVersion>()
    const waiting = new Map<Tag, Promise<TagVersion>>()
    const leading: Tag[] = []

    for (const tag of tags) {
      if (out.has(tag) || waiting.has(tag) || leading.includes(tag)) continue

      const mirrored = this.mirrored.get(tag)
      if (mirrored !== undefined) {
        out.set(tag, mirrored)
        continue
      }

      const flight = this.flights.get(tag)
      if (flight) waiting.set(tag, flight)
      else leading.push(tag)
    }

    if (leading.length > 0) {
      const batch = this.fetchOrInitialize(leading)

      for (const tag of leading) {
        const flight: Promise<TagVersion> = batch
          .then((versions) => this.versionIn(versions, tag))
          .finally(() => {
            if (this.flights.get(tag) === flight) this.flights.delete(tag)
          })

        this.flights.set(tag, flight)
        waiting.set(tag, flight)
      }
    }

    const settled = await Promise.all(
      [...waiting].map(async ([tag, flight]) => [tag, await flight] as const),
    )

    for (const [tag, version] of settled) {
      out.set(tag, version)
    }

    return out
  }

  /**
   * Advance the mirrored version by one.
   *
   * @returns the new version, or `undefined` when the tag is not mirrored
   */
  bump(tag: Tag): TagVersion | undefined {
    const current = this.mirrored.get(tag)
    if (current === undefined) return undefined

    this.mirrored.set(tag, current + 1)

    return current + 1
  }

  mirror(tag: Tag, version: TagVersion): void {
    this.mirrored.set(tag, version)
  }

  reset(): void {
    this.mirrored.clear()
  }

  private async fetchOrInitialize(tags: readonly Tag[]): Promise<Map<Tag, TagVersion>> {
    const fetched = await remoteCall("getMany", { tags: [...tags] }, () =>
      this.deps.versions.getMany(tags.map(tagVersionKey)),
    )

    const versions = new Map<Tag, TagVersion>()
    const missing: Tag[] = []

    for (const tag of tags) {
      const res = fetched.get(tagVersionKey(tag))

      if (res?.kind === "found") {
        versions.set(tag, res.value)
        this.mirrored.set(tag, res.value)
      } else {
        missing.push(tag)
      }
    }

    if (missing.length === 0) return versions

    await this.initialize(missing)

    for (const tag of missing) {
      versions.set(tag, 0)
      this.mirrored.set(tag, 0)
    }

    return versions
  }

  private async initialize(tags: readonly Tag[]): Promise<void> {
    const entries: KvEntry<TagVersion>[] = tags.map((tag) => [tagVersionKey(tag), 0])

    try {
      await this.deps.versions.setMany(entries)
    } catch (err) {
      this.deps.logger.error("Failed to initialize tag versions", { tags, err })

      throw new VersionStoreInconsistencyError(tags, err)
    }

    this.deps.logger.debug("Initialized tag versions", { tags })
  }

  private versionIn(versions: ReadonlyMap<Tag, TagVersion>, tag: Tag): TagVersion {
    const version = versions.get(tag)

    // fetchOrInitialize resolves every tag it was given or rejects
    if (version === undefined) throw new VersionStoreInconsistencyError([tag])

    return version
  }
}
