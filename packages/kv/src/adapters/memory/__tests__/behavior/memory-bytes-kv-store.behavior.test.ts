import { ManualTestClock } from "../../../../tests/utils/manual-test-clock"
import { bytes, keys } from "../../../../tests/utils/kv-test-helpers"
import { MemoryBytesKeyValueStore } from "../../memory-bytes-kv-store"

describe("MemoryBytesKeyValueStore (behavior)", () => {
  let clock: ManualTestClock

  beforeEach(() => {
    clock = new ManualTestClock()
  })

  describe("capacity", () => {
    it("throws when a write would exceed maxEntries", async () => {
      const store = new MemoryBytesKeyValueStore({ clock }, { maxEntries: 2 })

      await store.set(keys.one(), bytes.a())
      await store.set(keys.two(), bytes.a())

      await expect(store.set(keys.three(), bytes.a())).rejects.toThrow(
        "MemoryBytesKeyValueStore: max entries (2) exceeded",
      )
    })

    it("overwriting an existing key does not count against the limit", async () => {
      const store = new MemoryBytesKeyValueStore({ clock }, { maxEntries: 1 })

      await store.set(keys.one(), bytes.a())
      await store.set(keys.one(), bytes.b())

      expect(store.size).toBe(1)
    })

    it("expired entries free capacity", async () => {
      const store = new MemoryBytesKeyValueStore({ clock }, { maxEntries: 1 })

      await store.set(keys.one(), bytes.a(), { ttl: { kind: "milliseconds", milliseconds: 5 } })
      clock.advanceMs(5)

      await store.set(keys.two(), bytes.b())

      expect(store.size).toBe(1)
    })

    it("setMany checks capacity before writing anything", async () => {
      const store = new MemoryBytesKeyValueStore({ clock }, { maxEntries: 1 })

      await expect(
        store.setMany([
          [keys.one(), bytes.a()],
          [keys.two(), bytes.b()],
        ]),
      ).rejects.toBeInstanceOf(RangeError)

      expect(store.size).toBe(0)
    })
  })

  describe("isolation", () => {
    it("returned values are copies", async () => {
      const store = new MemoryBytesKeyValueStore({ clock })
      await store.set(keys.one(), bytes.a())

      const first = await store.get(keys.one())
      if (first.kind === "found") first.value[0] = 99

      expect(await store.get(keys.one())).toStrictEqual({ kind: "found", value: bytes.a() })
    })

    it("two instances do not share entries", async () => {
      const storeA = new MemoryBytesKeyValueStore({ clock })
      const storeB = new MemoryBytesKeyValueStore({ clock })

      await storeA.set(keys.one(), bytes.a())

      expect(await storeB.get(keys.one())).toStrictEqual({ kind: "not_found" })
    })
  })
})
