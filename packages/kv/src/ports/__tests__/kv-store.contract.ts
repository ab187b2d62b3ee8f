import { NotNumericValueError } from "../../core/errors"
import { ManualTestClock } from "../../tests/utils/manual-test-clock"
import { bytes, entry, keys } from "../../tests/utils/kv-test-helpers"
import type { BytesKeyValueStore } from "../bytes-kv-store"

type CreateBytesKvStore = (clock: ManualTestClock) => BytesKeyValueStore

export function describeKvStoreContract(
  adapterName: string,
  createStore: CreateBytesKvStore,
): void {
  describe(`BytesKeyValueStore Contract Tests - ${adapterName}`, () => {
    let clock: ManualTestClock
    let store: BytesKeyValueStore

    beforeEach(() => {
      clock = new ManualTestClock()
      store = createStore(clock)
    })

    describe("get/set basic semantics", () => {
      it("returns not_found when key is absent", async () => {
        const res = await store.get("missing")

        expect(res).toStrictEqual({ kind: "not_found" })
      })

      it("returns found after set with the same bytes that were set", async () => {
        const [key, value] = entry(keys.one(), bytes.a())

        await store.set(key, value)

        expect(await store.get(key)).toStrictEqual({ kind: "found", value })
      })

      it("overwriting an existing key updates the stored value", async () => {
        await store.set(keys.one(), bytes.a())
        await store.set(keys.one(), bytes.b())

        expect(await store.get(keys.one())).toStrictEqual({ kind: "found", value: bytes.b() })
      })

      it("stores empty values", async () => {
        await store.set(keys.one(), bytes.empty())

        expect(await store.get(keys.one())).toStrictEqual({
          kind: "found",
          value: bytes.empty(),
        })
      })

      it("mutating the input after set does not change the stored value", async () => {
        const value = bytes.a()

        await store.set(keys.one(), value)
        value[0] = 42

        expect(await store.get(keys.one())).toStrictEqual({ kind: "found", value: bytes.a() })
      })
    })

    describe("delete semantics", () => {
      it("delete on absent key is a no-op", async () => {
        await expect(store.delete("missing")).resolves.toBeUndefined()
      })

      it("delete removes an existing key", async () => {
        await store.set(keys.one(), bytes.a())

        await store.delete(keys.one())

        expect(await store.get(keys.one())).toStrictEqual({ kind: "not_found" })
      })
    })

    describe("ttl semantics", () => {
      it("expires an entry once its ttl has elapsed", async () => {
        await store.set(keys.one(), bytes.a(), { ttl: { kind: "seconds", seconds: 2 } })

        clock.advanceMs(1999)
        expect(await store.get(keys.one())).toStrictEqual({ kind: "found", value: bytes.a() })

        clock.advanceMs(1)
        expect(await store.get(keys.one())).toStrictEqual({ kind: "not_found" })
      })

      it("treats a non-positive ttl as no expiration", async () => {
        await store.set(keys.one(), bytes.a(), { ttl: { kind: "seconds", seconds: 0 } })
        await store.set(keys.two(), bytes.a(), {
          ttl: { kind: "milliseconds", milliseconds: -5 },
        })

        clock.advanceMs(365 * 24 * 60 * 60 * 1000)

        expect(await store.get(keys.one())).toStrictEqual({ kind: "found", value: bytes.a() })
        expect(await store.get(keys.two())).toStrictEqual({ kind: "found", value: bytes.a() })
      })

      it("a set without ttl replaces a previous expiration", async () => {
        await store.set(keys.one(), bytes.a(), {
          ttl: { kind: "milliseconds", milliseconds: 10 },
        })
        await store.set(keys.one(), bytes.b())

        clock.advanceMs(1000)

        expect(await store.get(keys.one())).toStrictEqual({ kind: "found", value: bytes.b() })
      })
    })

    describe("counters", () => {
      it("increment returns not_found and does not create an absent key", async () => {
        expect(await store.increment(keys.one(), 1)).toStrictEqual({ kind: "not_found" })
        expect(await store.get(keys.one())).toStrictEqual({ kind: "not_found" })
      })

      it("increment adds to a stored decimal integer", async () => {
        await store.set(keys.one(), bytes.text("5"))

        expect(await store.increment(keys.one(), 3)).toStrictEqual({
          kind: "updated",
          value: 8,
        })
        expect(await store.get(keys.one())).toStrictEqual({
          kind: "found",
          value: bytes.text("8"),
        })
      })

      it("decrement floors at zero", async () => {
        await store.set(keys.one(), bytes.text("2"))

        expect(await store.decrement(keys.one(), 5)).toStrictEqual({
          kind: "updated",
          value: 0,
        })
      })

      it("decrement returns not_found for an absent key", async () => {
        expect(await store.decrement(keys.one(), 1)).toStrictEqual({ kind: "not_found" })
      })

      it("rejects with NotNumericValueError for non-numeric values", async () => {
        await store.set(keys.one(), bytes.text('"abc"'))

        await expect(store.increment(keys.one(), 1)).rejects.toBeInstanceOf(
          NotNumericValueError,
        )
        await expect(store.decrement(keys.one(), 1)).rejects.toBeInstanceOf(
          NotNumericValueError,
        )
      })

      it("rejects a negative or fractional step", async () => {
        await store.set(keys.one(), bytes.text("1"))

        await expect(store.increment(keys.one(), -1)).rejects.toBeInstanceOf(RangeError)
        await expect(store.decrement(keys.one(), 1.5)).rejects.toBeInstanceOf(RangeError)
      })

      it("keeps the entry's expiration", async () => {
        await store.set(keys.one(), bytes.text("1"), {
          ttl: { kind: "milliseconds", milliseconds: 100 },
        })

        await store.increment(keys.one(), 1)
        clock.advanceMs(100)

        expect(await store.get(keys.one())).toStrictEqual({ kind: "not_found" })
      })
    })

    describe("bulk operations", () => {
      it("getMany on empty input returns an empty map", async () => {
        const res = await store.getMany([])

        expect(res.size).toBe(0)
      })

      it("getMany reports found and missing keys in request order", async () => {
        await store.set(keys.two(), bytes.b())

        const res = await store.getMany([keys.one(), keys.two()])

        expect(Array.from(res.entries())).toStrictEqual([
          [keys.one(), { kind: "not_found" }],
          [keys.two(), { kind: "found", value: bytes.b() }],
        ])
      })

      it("setMany writes every entry with the shared ttl", async () => {
        await store.setMany(
          [entry(keys.one(), bytes.a()), entry(keys.two(), bytes.b())],
          { ttl: { kind: "seconds", seconds: 1 } },
        )

        expect(await store.get(keys.two())).toStrictEqual({ kind: "found", value: bytes.b() })

        clock.advanceMs(1000)

        const res = await store.getMany([keys.one(), keys.two()])
        expect(Array.from(res.values())).toStrictEqual([
          { kind: "not_found" },
          { kind: "not_found" },
        ])
      })

      it("setMany keeps the last value of a repeated key", async () => {
        await store.setMany([entry(keys.one(), bytes.a()), entry(keys.one(), bytes.b())])

        expect(await store.get(keys.one())).toStrictEqual({ kind: "found", value: bytes.b() })
      })
    })
  })
}
