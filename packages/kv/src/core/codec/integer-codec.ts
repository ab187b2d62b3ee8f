import type { Codec } from "../../ports/codec"
import { formatCounter, parseCounter } from "../counter/counter-value"

/**
 * Non-negative integers as decimal text, the representation counters use.
 */
export function integerCodec(): Codec<number> {
  return {
    encode(value: number) {
      if (!Number.isSafeInteger(value) || value < 0) {
        throw new RangeError(`Expected a non-negative integer, got ${value}`)
      }

      return formatCounter(value)
    },
    decode(bytes: Uint8Array) {
      const value = parseCounter(bytes)

      if (value === undefined) {
        throw new RangeError("Stored bytes are not a non-negative integer")
      }

      return value
    },
  }
}
