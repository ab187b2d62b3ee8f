import type { KvKey } from "../../ports/kv-key"

const encoder = new TextEncoder()

export const bytes = {
  a(): Uint8Array {
    return new Uint8Array([1, 2, 3])
  },
  b(): Uint8Array {
    return new Uint8Array([9, 8, 7])
  },
  empty(): Uint8Array {
    return new Uint8Array([])
  },
  text(value: string): Uint8Array {
    return encoder.encode(value)
  },
}

export const keys = {
  one(): KvKey {
    return "k:one"
  },
  two(): KvKey {
    return "k:two"
  },
  three(): KvKey {
    return "k:three"
  },
  four(): KvKey {
    return "k:four"
  },
  five(): KvKey {
    return "k:five"
  },
}

export const entry = <T>(key: KvKey, value: T): [KvKey, T] => [key, value]
