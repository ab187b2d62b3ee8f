import type { Tag, TagVersion } from "./tag"

/**
 * What `clearTags` did for one tag.
 *
 * - `bumped`: the remote version was incremented to `version`.
 * - `initialized`: the tag did not exist remotely and was created at 0.
 * - `missing`: the tag did not exist remotely and was left absent. When this
 *   client had mirrored a version, `localVersion` is the bumped local copy.
 */
export type TagClearance =
  | { tag: Tag; outcome: "bumped"; version: TagVersion }
  | { tag: Tag; outcome: "initialized"; version: TagVersion }
  | { tag: Tag; outcome: "missing"; localVersion?: TagVersion }
