import { BaseError, serializeError } from "../base-error"

describe("serializeError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe("BaseError instances", () => {
    it("serializes all fields", () => {
      const err = new BaseError("get failed", {
        code: "remote_unavailable",
        context: { key: "KEY_1" },
        isRetryable: true,
      })

      expect(serializeError(err)).toStrictEqual({
        name: "BaseError",
        code: "remote_unavailable",
        message: "get failed",
        context: { key: "KEY_1" },
        isOperational: true,
        isRetryable: true,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })

    it("excludes the stack unless asked", () => {
      const err = new BaseError("x", { code: "x" })

      expect(serializeError(err).stack).toBeUndefined()
      expect(serializeError(err, { includeStack: true }).stack).toContain("BaseError")
    })

    it("serializes the cause chain", () => {
      const root = new Error("socket closed")
      const outer = new BaseError("outer", { code: "outer", cause: root })

      const serialized = serializeError(outer)

      expect(serialized.cause).toStrictEqual({
        name: "Error",
        code: "unknown",
        message: "socket closed",
        context: {},
        isOperational: false,
        isRetryable: false,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })
  })

  describe("non-BaseError values", () => {
    it("maps plain errors to the unknown code", () => {
      const serialized = serializeError(new TypeError("bad"))

      expect(serialized.name).toBe("TypeError")
      expect(serialized.code).toBe("unknown")
      expect(serialized.isOperational).toBe(false)
    })

    it("wraps strings as the message", () => {
      const serialized = serializeError("boom")

      expect(serialized.name).toBe("NonErrorThrown")
      expect(serialized.message).toBe("boom")
      expect(serialized.context).toStrictEqual({ value: "boom" })
    })

    it("keeps other thrown values in context", () => {
      const serialized = serializeError(42)

      expect(serialized.message).toBe("Unknown error")
      expect(serialized.context).toStrictEqual({ value: 42 })
    })
  })
})
