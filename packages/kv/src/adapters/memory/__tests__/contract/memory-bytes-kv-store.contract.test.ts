import { describeKvStoreContract } from "../../../../ports/__tests__/kv-store.contract"
import { MemoryBytesKeyValueStore } from "../../memory-bytes-kv-store"

describeKvStoreContract("MemoryBytesKeyValueStore", (clock) => {
  return new MemoryBytesKeyValueStore({ clock }, { maxEntries: 1000 })
})
