/**
 * Codec defines a bidirectional transformation between a typed value `T`
 * and a byte representation.
 *
 * @remarks
 * Codecs sit between typed stores (`KeyValueStore<T>`) and byte-oriented
 * adapters. They must be pure and deterministic; adapters never see them.
 *
 * Counter operations work on the stored bytes directly, so values meant to be
 * incremented must encode integers as plain decimal text (see `jsonCodec` and
 * `integerCodec`).
 */
export interface Codec<T> {
  encode(value: T): Uint8Array

  decode(bytes: Uint8Array): T
}
