const encoder = new TextEncoder()
const decoder = new TextDecoder()

const COUNTER_PATTERN = /^\d+$/

/**
 * Parse the decimal text of a stored counter.
 *
 * @returns the value, or `undefined` when the bytes are not a non-negative integer
 */
export function parseCounter(bytes: Uint8Array): number | undefined {
  const text = decoder.decode(bytes)
  if (!COUNTER_PATTERN.test(text)) return undefined

  const value = Number(text)

  return Number.isSafeInteger(value) ? value : undefined
}

export function formatCounter(value: number): Uint8Array {
  return encoder.encode(String(value))
}

/**
 * Apply a counter delta, flooring at 0.
 */
export function applyCounterDelta(current: number, delta: number): number {
  return Math.max(0, current + delta)
}

export function assertCounterStep(by: number): void {
  if (!Number.isSafeInteger(by) || by < 0) {
    throw new RangeError(`Counter step must be a non-negative integer, got ${by}`)
  }
}
