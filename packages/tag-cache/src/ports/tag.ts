/**
 * Canonical tag: lowercase, `[a-z0-9_]` only, never empty.
 *
 * @example
 * ```ts
 * normalizeTags(["Users", "feature-flags"]) // ["users", "featureflags"]
 * ```
 */
export type Tag = string

/**
 * Generation counter of a tag. Bumping it orphans every entry keyed under the
 * previous generation.
 */
export type TagVersion = number
