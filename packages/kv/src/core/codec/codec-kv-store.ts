import type { BytesKeyValueStore } from "../../ports/bytes-kv-store"
import type { Codec } from "../../ports/codec"
import type { KvKey } from "../../ports/kv-key"
import type { KvSetOptions } from "../../ports/kv-options"
import type { KvCounterResult, KvResult } from "../../ports/kv-result"
import type { KeyValueStore } from "../../ports/kv-store"
import type { KvEntry } from "../../ports/kv-value"
import { ValueCodecError } from "../errors"

export type CodecKeyValueStoreDeps<T> = {
  codec: Codec<T>
  bytesStore: BytesKeyValueStore
}

/**
 * Typed view over a bytes store.
 *
 * @remarks
 * Codec failures surface as {@link ValueCodecError}; backend failures pass
 * through unchanged.
 */
export class CodecKeyValueStore<T> implements KeyValueStore<T> {
  public constructor(private readonly deps: CodecKeyValueStoreDeps<T>) {}

  async get(key: KvKey): Promise<KvResult<T>> {
    const res = await this.deps.bytesStore.get(key)

    return this.decodeResult(key, res)
  }

  async set(key: KvKey, value: T, opts?: Partial<KvSetOptions>): Promise<void> {
    await this.deps.bytesStore.set(key, this.encode(key, value), opts)
  }

  async delete(key: KvKey): Promise<void> {
    await this.deps.bytesStore.delete(key)
  }

  async increment(key: KvKey, by: number): Promise<KvCounterResult> {
    return await this.deps.bytesStore.increment(key, by)
  }

  async decrement(key: KvKey, by: number): Promise<KvCounterResult> {
    return await this.deps.bytesStore.decrement(key, by)
  }

  async getMany(keys: readonly KvKey[]): Promise<Map<KvKey, KvResult<T>>> {
    const res = await this.deps.bytesStore.getMany(keys)

    const out = new Map<KvKey, KvResult<T>>()
    for (const [k, v] of res.entries()) {
      out.set(k, this.decodeResult(k, v))
    }

    return out
  }

  async setMany(
    entries: readonly KvEntry<T>[],
    opts?: Partial<KvSetOptions>,
  ): Promise<void> {
    const encoded: readonly KvEntry<Uint8Array>[] = entries.map(
      ([k, v]) => [k, this.encode(k, v)] as const,
    )
    await this.deps.bytesStore.setMany(encoded, opts)
  }

  private encode(key: KvKey, value: T): Uint8Array {
    try {
      return this.deps.codec.encode(value)
    } catch (err) {
      throw new ValueCodecError(key, "encode", err)
    }
  }

  private decodeResult(key: KvKey, res: KvResult<Uint8Array>): KvResult<T> {
    if (res.kind === "not_found") return res

    try {
      return { kind: "found", value: this.deps.codec.decode(res.value) }
    } catch (err) {
      throw new ValueCodecError(key, "decode", err)
    }
  }
}

export function createCodecKeyValueStore<T>(
  deps: CodecKeyValueStoreDeps<T>,
): KeyValueStore<T> {
  return new CodecKeyValueStore(deps)
}
