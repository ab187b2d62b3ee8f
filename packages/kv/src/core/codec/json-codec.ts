import superjson from "superjson"
import type { Codec } from "../../ports/codec"

const encoder = new TextEncoder()
const decoder = new TextDecoder()

/**
 * Plain JSON. Numbers encode as decimal text, so stored integers stay usable
 * as counters.
 *
 * @remarks
 * Values without a JSON form (`undefined`, functions, symbols) are rejected
 * on encode.
 */
export function jsonCodec<T>(): Codec<T> {
  return {
    encode: (value: T) => {
      const text: string | undefined = JSON.stringify(value)

      if (text === undefined) {
        throw new TypeError(`Value of type ${typeof value} has no JSON representation`)
      }

      return encoder.encode(text)
    },
    decode: (bytes: Uint8Array) => JSON.parse(decoder.decode(bytes)),
  }
}

/**
 * superjson keeps `Date`, `Map`, `Set` and `BigInt` intact, at the price of a
 * wrapped payload that counter operations cannot read.
 */
export function superjsonCodec<T>(): Codec<T> {
  return {
    encode: (value: T) => encoder.encode(superjson.stringify(value)),
    decode: (bytes: Uint8Array) => superjson.parse<T>(decoder.decode(bytes)),
  }
}
