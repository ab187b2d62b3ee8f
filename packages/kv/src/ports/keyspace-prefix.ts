/**
 * Prefix that scopes an adapter to its partition of a shared backend, e.g.
 * `catalog:prod:cache:`. Adapters prepend it verbatim to every key.
 */
export type KeyspacePrefix = string
