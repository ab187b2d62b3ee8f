import type { AppError } from "@tagstash/errors"

export type CounterUpdated = {
  kind: "updated"
  value: number
}

/**
 * The entry does not exist. Counters are never created implicitly.
 */
export type CounterMissing = {
  kind: "missing"
}

export type CounterFailed = {
  kind: "failed"
  error: AppError
}

export type CounterResult = CounterUpdated | CounterMissing | CounterFailed
