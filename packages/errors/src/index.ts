export { BaseError, type BaseErrorOptions, type SerializeOptions, serializeError } from "./core/base-error"
export { ErrorCodes, type KnownErrorCode } from "./core/error-codes"
export { isAppError } from "./core/utils/is-app-error"
export { type ToAppErrorOptions, toAppError } from "./core/utils/to-app-error"
export type { AppError, ErrorCode, ErrorContext, SerializedError } from "./ports/error"
