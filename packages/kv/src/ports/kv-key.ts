/**
 * Key in the remote store. Adapters treat it as opaque and only prepend their
 * keyspace prefix.
 */
export type KvKey = string
