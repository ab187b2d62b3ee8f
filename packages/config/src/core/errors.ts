import { BaseError, ErrorCodes } from "@tagstash/errors"

export class ConfigValidationError extends BaseError<typeof ErrorCodes.InvalidConfig> {
  constructor(details: string, sources: readonly string[]) {
    super(`Configuration validation failed:\n${details}`, {
      code: ErrorCodes.InvalidConfig,
      context: { sources: [...sources] },
    })
  }
}
