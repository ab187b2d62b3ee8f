import type { KeyValueStore } from "./kv-store"

export type BytesKeyValueStore = KeyValueStore<Uint8Array>
