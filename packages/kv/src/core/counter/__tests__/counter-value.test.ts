import { bytes } from "../../../tests/utils/kv-test-helpers"
import {
  applyCounterDelta,
  assertCounterStep,
  formatCounter,
  parseCounter,
} from "../counter-value"

describe("counter values", () => {
  it.each([
    ["0", 0],
    ["15", 15],
    ["007", 7],
  ])("parses %j as %i", (text, expected) => {
    expect(parseCounter(bytes.text(text))).toBe(expected)
  })

  it.each(["", "-1", "1.5", " 1", '"1"', "99999999999999999999"])(
    "does not parse %j",
    (text) => {
      expect(parseCounter(bytes.text(text))).toBeUndefined()
    },
  )

  it("formats as decimal text", () => {
    expect(formatCounter(120)).toStrictEqual(bytes.text("120"))
  })

  it("floors deltas at zero", () => {
    expect(applyCounterDelta(3, -5)).toBe(0)
    expect(applyCounterDelta(3, 2)).toBe(5)
  })

  it("accepts only non-negative integer steps", () => {
    expect(() => assertCounterStep(0)).not.toThrow()
    expect(() => assertCounterStep(-1)).toThrow(
      "Counter step must be a non-negative integer, got -1",
    )
    expect(() => assertCounterStep(Number.NaN)).toThrow(RangeError)
  })
})
