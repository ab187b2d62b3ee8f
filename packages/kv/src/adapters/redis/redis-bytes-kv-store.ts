import { assertCounterStep } from "../../core/counter/counter-value"
import { NotNumericValueError } from "../../core/errors"
import type { BytesKeyValueStore } from "../../ports/bytes-kv-store"
import type { KeyspacePrefix } from "../../ports/keyspace-prefix"
import type { KvKey } from "../../ports/kv-key"
import type { KvSetOptions, KvTtl } from "../../ports/kv-options"
import type { KvCounterResult, KvResult } from "../../ports/kv-result"
import type { KvEntry } from "../../ports/kv-value"
import type { RedisBytesClient, RedisTtl } from "./redis-client"

export type RedisKvStoreOptions = {
  /**
   * Maximum number of keys sent in a single `MGET` or `MULTI` by the bulk
   * methods. Larger requests are split into consecutive batches.
   *
   * Typical values are in the range of 500–2000.
   */
  batchSize: number

  keyspacePrefix: KeyspacePrefix
}

const INCREMENT_SCRIPT = `
  -- KEYS[1] = counter key
  -- ARGV[1] = step
  if redis.call('EXISTS', KEYS[1]) == 0 then
    return false
  end

  return redis.call('INCRBY', KEYS[1], ARGV[1])
`

const DECREMENT_SCRIPT = `
  -- KEYS[1] = counter key
  -- ARGV[1] = step
  local current = redis.call('GET', KEYS[1])
  if not current then
    return false
  end

  local n = tonumber(current)
  if not n or n < 0 or n ~= math.floor(n) or not string.match(current, '^%d+$') then
    return redis.error_reply('ERR value is not an integer or out of range')
  end

  local next = n - tonumber(ARGV[1])
  if next < 0 then
    next = 0
  end

  redis.call('SET', KEYS[1], next, 'KEEPTTL')

  return next
`

export class RedisBytesKeyValueStore implements BytesKeyValueStore {
  public constructor(
    private readonly client: RedisBytesClient,
    private readonly opts: RedisKvStoreOptions,
  ) {}

  async get(key: KvKey): Promise<KvResult<Uint8Array>> {
    const buffer = await this.client.get(this.fullKey(key))

    return this.createKvResult(buffer)
  }

  async set(key: KvKey, value: Uint8Array, opts?: Partial<KvSetOptions>): Promise<void> {
    const ttl = this.toRedisTtl(opts?.ttl)
    const fullKey = this.fullKey(key)
    const buffer = this.toBuffer(value)

    if (ttl) {
      await this.client.set(fullKey, buffer, ttl)
    } else {
      await this.client.set(fullKey, buffer)
    }
  }

  async delete(key: KvKey): Promise<void> {
    await this.client.del(this.fullKey(key))
  }

  async increment(key: KvKey, by: number): Promise<KvCounterResult> {
    assertCounterStep(by)

    return this.runCounterScript(INCREMENT_SCRIPT, key, by)
  }

  async decrement(key: KvKey, by: number): Promise<KvCounterResult> {
    assertCounterStep(by)

    return this.runCounterScript(DECREMENT_SCRIPT, key, by)
  }

  async getMany(keys: readonly KvKey[]): Promise<Map<KvKey, KvResult<Uint8Array>>> {
    if (keys.length === 0) return new Map()

    const out = new Map<KvKey, KvResult<Uint8Array>>()

    for (const batch of this.chunks(keys, this.opts.batchSize)) {
      const fullKeys = batch.map((k) => this.fullKey(k))
      const buffers = await this.client.mGet(fullKeys)

      for (const [i, key] of batch.entries()) {
        out.set(key, this.createKvResult(buffers[i] ?? null))
      }
    }

    return out
  }

  async setMany(
    entries: readonly KvEntry<Uint8Array>[],
    opts?: Partial<KvSetOptions>,
  ): Promise<void> {
    if (entries.length === 0) return

    const ttl = this.toRedisTtl(opts?.ttl)

    for (const batch of this.chunks(entries, this.opts.batchSize)) {
      const tx = this.client.multi()

      for (const [key, value] of batch) {
        const fullKey = this.fullKey(key)
        const buf = this.toBuffer(value)

        if (ttl) tx.set(fullKey, buf, ttl)
        else tx.set(fullKey, buf)
      }

      await tx.exec()
    }
  }

  private async runCounterScript(
    script: string,
    key: KvKey,
    by: number,
  ): Promise<KvCounterResult> {
    let reply: unknown

    try {
      reply = await this.client.eval(script, {
        keys: [this.fullKey(key)],
        arguments: [String(by)],
      })
    } catch (err) {
      if (err instanceof Error && err.message.includes("not an integer")) {
        throw new NotNumericValueError(key, err)
      }
      throw err
    }

    if (reply === null) return { kind: "not_found" }

    if (typeof reply !== "number") {
      throw new TypeError(`Unexpected counter reply for "${key}": ${String(reply)}`)
    }

    return { kind: "updated", value: reply }
  }

  private *chunks<T>(items: readonly T[], size: number): Generator<readonly T[]> {
    for (let i = 0; i < items.length; i += size) {
      yield items.slice(i, i + size)
    }
  }

  private toRedisTtl(ttl: KvTtl | undefined): RedisTtl | undefined {
    if (!ttl) return undefined

    if (ttl.kind === "seconds") {
      return ttl.seconds > 0 ? { EX: ttl.seconds } : undefined
    }

    return ttl.milliseconds > 0 ? { PX: ttl.milliseconds } : undefined
  }

  private toBuffer(value: Uint8Array): Buffer {
    return Buffer.from(value.buffer, value.byteOffset, value.byteLength)
  }

  private createKvResult(buffer: Buffer | null): KvResult<Uint8Array> {
    if (buffer === null) return { kind: "not_found" }

    return { kind: "found", value: new Uint8Array(buffer) }
  }

  private fullKey(k: KvKey): string {
    return `${this.opts.keyspacePrefix}${k}`
  }
}
