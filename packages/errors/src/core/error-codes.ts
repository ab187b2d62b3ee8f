/**
 * Error codes shared by every package of the workspace.
 */
export const ErrorCodes = {
  /** The key-value backend did not answer or answered with a transport error. */
  RemoteUnavailable: "remote_unavailable",

  /** Newly seen tag versions could not be persisted. */
  VersionStoreInconsistency: "version_store_inconsistency",

  /** A counter operation hit a value that is not a non-negative integer. */
  NotNumericValue: "not_numeric_value",

  /** A value could not be encoded for storage, or stored bytes could not be decoded. */
  ValueCodec: "value_codec",

  InvalidConfig: "invalid_config",

  Unknown: "unknown",
} as const

export type KnownErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes]
