/**
 * Storage key derived from an id and the live versions of its tags. Opaque to
 * callers; exposed only for diagnostics.
 */
export type CacheKey = string
