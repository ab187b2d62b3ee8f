import type { Tag } from "../../ports/tag"

const DISALLOWED_TAG_CHARS = /[^A-Za-z0-9_]/g

/**
 * Strip before lowercasing so that non-ASCII letters with ASCII lowercase
 * forms (e.g. the Kelvin sign) are dropped rather than folded.
 */
export function sanitizeTag(raw: string): string {
  return raw.replace(DISALLOWED_TAG_CHARS, "").toLowerCase()
}

export function isPresentTag(tag: string): boolean {
  return tag !== ""
}

/**
 * Canonicalize raw tags: sanitize, drop empties, keep the first occurrence of
 * each. Malformed tags are dropped silently.
 */
export function normalizeTags(raw: readonly string[]): Tag[] {
  return [...new Set(raw.map(sanitizeTag).filter(isPresentTag))]
}
