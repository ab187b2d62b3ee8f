import { BaseError, ErrorCodes, type ErrorContext } from "@tagstash/errors"
import type { Tag } from "../ports/tag"

export type RemoteOperation =
  | "get"
  | "set"
  | "delete"
  | "increment"
  | "decrement"
  | "getMany"
  | "setMany"

/**
 * A call to the remote store failed at the transport or backend level.
 */
export class RemoteUnavailableError extends BaseError<typeof ErrorCodes.RemoteUnavailable> {
  constructor(operation: RemoteOperation, context: ErrorContext, cause: unknown) {
    super(`Remote store ${operation} failed`, {
      code: ErrorCodes.RemoteUnavailable,
      context: { ...context, operation },
      cause,
      isRetryable: true,
    })
  }
}

/**
 * New tags could not be persisted at version 0. A key derived from an
 * unpersisted baseline could disagree with other clients, so derivation aborts.
 */
export class VersionStoreInconsistencyError extends BaseError<
  typeof ErrorCodes.VersionStoreInconsistency
> {
  constructor(tags: readonly Tag[], cause?: unknown) {
    super(`Failed to initialize versions for tags: ${tags.join(", ")}`, {
      code: ErrorCodes.VersionStoreInconsistency,
      context: { tags: [...tags] },
      cause,
      isOperational: false,
    })
  }
}
