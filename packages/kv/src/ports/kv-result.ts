export type KvFound<T> = {
  readonly kind: "found"
  readonly value: T
}

export type KvNotFound = {
  readonly kind: "not_found"
}

export type KvResult<T> = KvFound<T> | KvNotFound

/**
 * Outcome of an atomic counter update. Counters are never created implicitly,
 * so an absent key is reported instead of being initialized.
 */
export type KvCounterResult =
  | { readonly kind: "updated"; readonly value: number }
  | KvNotFound
