import { createCore } from "../../../tests/utils/tag-cache-harness"

describe("KeyDeriver", () => {
  it("hashes the id alone for untagged keys", async () => {
    const core = createCore({ environment: "prod_" })
    const resolve = vi.spyOn(core.resolver, "resolve")

    expect(await core.keys.derive("foo", [])).toBe("KEY_acbd18db4cc2f85cedef654fccc4a4d8")
    expect(resolve).not.toHaveBeenCalled()
  })

  it("prefixes untagged keys with the environment when enabled", async () => {
    const core = createCore({ environment: "prod_", prefixUntaggedKeys: true })

    expect(await core.keys.derive("foo", [])).toBe("prod_KEY_acbd18db4cc2f85cedef654fccc4a4d8")
  })

  it("folds sorted versioned tag names into tagged keys", async () => {
    const core = createCore({ environment: "prod_" })

    expect(await core.keys.derive("foo", ["baz", "bar"])).toBe(
      "prod_KEY_3f52c772ae2904e0829b83eb92873503",
    )
  })

  it("changes the key when a tag version changes", async () => {
    const core = createCore()
    await core.keys.derive("foo", ["bar", "baz"])

    core.resolver.mirror("bar", 1)

    expect(await core.keys.derive("foo", ["bar", "baz"])).toBe(
      "KEY_de54652fb5cefe9cfdfad6628f908a52",
    )
  })
})
