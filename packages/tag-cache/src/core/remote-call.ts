import { type ErrorContext, isAppError } from "@tagstash/errors"
import { type RemoteOperation, RemoteUnavailableError } from "./errors"

/**
 * Run a remote store call, turning unclassified failures into
 * `RemoteUnavailableError`. Errors that already carry a code pass through.
 */
export async function remoteCall<R>(
  operation: RemoteOperation,
  context: ErrorContext,
  fn: () => Promise<R>,
): Promise<R> {
  try {
    return await fn()
  } catch (err) {
    if (isAppError(err)) throw err

    throw new RemoteUnavailableError(operation, context, err)
  }
}
