import { BaseError, ErrorCodes } from "@tagstash/errors"
import type { KvKey } from "../ports/kv-key"

export class NotNumericValueError extends BaseError<typeof ErrorCodes.NotNumericValue> {
  constructor(key: KvKey, cause?: unknown) {
    super(`Value stored under "${key}" is not a non-negative integer`, {
      code: ErrorCodes.NotNumericValue,
      context: { key },
      cause,
    })
  }
}

export type CodecDirection = "encode" | "decode"

/**
 * The codec rejected a value on its way in or out of the store. Retrying does
 * not help: the same bytes or value fail again.
 */
export class ValueCodecError extends BaseError<typeof ErrorCodes.ValueCodec> {
  constructor(key: KvKey, direction: CodecDirection, cause: unknown) {
    super(`Failed to ${direction} value under "${key}"`, {
      code: ErrorCodes.ValueCodec,
      context: { key, direction },
      cause,
    })
  }
}
