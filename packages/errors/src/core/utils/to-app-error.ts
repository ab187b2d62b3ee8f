import type { AppError, ErrorCode, ErrorContext } from "../../ports/error"
import { BaseError } from "../base-error"
import { ErrorCodes } from "../error-codes"
import { isAppError } from "./is-app-error"

export type ToAppErrorOptions = Readonly<{
  /** Code used when the value is not already an AppError. Default: `unknown` */
  fallbackCode?: ErrorCode

  /** Context merged into the wrapper. Ignored for values that are already AppErrors. */
  context?: ErrorContext

  isRetryable?: boolean
  isOperational?: boolean
}>

/**
 * Convert any thrown value to an AppError.
 *
 * - AppErrors pass through unchanged
 * - Error instances are wrapped, keeping the original as `cause`
 * - Non-Error values are wrapped and kept in `context.value`
 *
 * Wrappers default to `isOperational: false` unless told otherwise.
 */
export function toAppError(err: unknown, options: ToAppErrorOptions = {}): AppError {
  if (isAppError(err)) {
    return err
  }

  const code = options.fallbackCode ?? ErrorCodes.Unknown
  const isOperational = options.isOperational ?? false
  const isRetryable = options.isRetryable ?? false

  if (err instanceof Error) {
    return new BaseError(err.message, {
      code,
      cause: err,
      context: options.context,
      isOperational,
      isRetryable,
    })
  }

  return new BaseError(typeof err === "string" ? err : "Unknown error", {
    code,
    context: typeof err === "string" ? options.context : { ...options.context, value: err },
    isOperational,
    isRetryable,
  })
}
