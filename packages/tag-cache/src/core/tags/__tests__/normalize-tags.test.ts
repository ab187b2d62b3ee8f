import { isPresentTag, normalizeTags, sanitizeTag } from "../normalize-tags"

describe("normalizeTags", () => {
  it("lowercases and strips characters outside [a-z0-9_]", () => {
    expect(sanitizeTag("Feature-Flags!")).toBe("featureflags")
    expect(sanitizeTag("user_42")).toBe("user_42")
  })

  it("drops non-ASCII letters instead of folding them", () => {
    expect(sanitizeTag("\u212Aelvin")).toBe("elvin")
    expect(sanitizeTag("Über")).toBe("ber")
  })

  it("treats only the empty string as absent", () => {
    expect(isPresentTag("")).toBe(false)
    expect(isPresentTag("0")).toBe(true)
  })

  it("drops empties and keeps the first occurrence of duplicates", () => {
    expect(normalizeTags(["Users", "", "!!!", "users", "POSTS", "Users"])).toStrictEqual([
      "users",
      "posts",
    ])
  })

  it("returns an empty list for no input", () => {
    expect(normalizeTags([])).toStrictEqual([])
  })
})
