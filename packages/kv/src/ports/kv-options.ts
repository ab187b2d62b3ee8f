import type { Milliseconds, Seconds } from "./time"

type SecondsTtl = { kind: "seconds"; seconds: Seconds }
type MillisecondsTtl = { kind: "milliseconds"; milliseconds: Milliseconds }

/**
 * Relative expiration of an entry. A non-positive duration means the entry
 * never expires, the same as omitting the TTL.
 */
export type KvTtl = SecondsTtl | MillisecondsTtl

export interface KvSetOptions {
  /**
   * Expiration of the written entries. Writes without a TTL replace any
   * previous expiration with "never".
   */
  readonly ttl?: KvTtl
}
