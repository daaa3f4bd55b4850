import { BaseError, serializeError } from "../base-error"

describe("serializeError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2025-03-01T08:00:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe("BaseError", () => {
    it("keeps code, context and flags", () => {
      const err = new BaseError("bad payload", {
        code: "decoding_error",
        context: { path: "/all" },
        isRetryable: false,
        isOperational: true,
      })

      expect(serializeError(err)).toEqual({
        name: "BaseError",
        code: "decoding_error",
        message: "bad payload",
        context: { path: "/all" },
        isOperational: true,
        isRetryable: false,
        timestamp: "2025-03-01T08:00:00.000Z",
      })
    })

    it("leaves out the stack unless asked", () => {
      const err = new BaseError("x", { code: "test" })

      expect("stack" in serializeError(err)).toBe(false)
      expect(serializeError(err, { includeStack: true }).stack).toContain("BaseError: x")
    })

    it("leaves out an empty stack even when asked", () => {
      const err = new BaseError("x", { code: "test" })
      err.stack = ""

      expect("stack" in serializeError(err, { includeStack: true })).toBe(false)
    })

    it("serializes the cause chain", () => {
      const root = new Error("socket hang up")
      const middle = new BaseError("fetch failed", { code: "network_error", cause: root })
      const outer = new BaseError("refresh failed", { code: "storage_error", cause: middle })

      const serialized = serializeError(outer)

      expect(serialized.cause?.code).toBe("network_error")
      expect(serialized.cause?.cause?.code).toBe("unknown")
      expect(serialized.cause?.cause?.message).toBe("socket hang up")
      expect("cause" in serializeError(root)).toBe(false)
    })
  })

  describe("plain Error", () => {
    it("uses code unknown and marks it non-operational", () => {
      const serialized = serializeError(new TypeError("x is not a function"))

      expect(serialized).toMatchObject({
        name: "TypeError",
        code: "unknown",
        message: "x is not a function",
        isOperational: false,
        isRetryable: false,
      })
    })

    it("serializes a native cause", () => {
      const err = new Error("wrapper", { cause: new Error("root") })

      expect(serializeError(err).cause?.message).toBe("root")
    })
  })

  describe("non-Error values", () => {
    it("uses a thrown string as the message", () => {
      const serialized = serializeError("gone")

      expect(serialized.name).toBe("NonErrorThrown")
      expect(serialized.message).toBe("gone")
    })

    it("wraps other values in context.value", () => {
      expect(serializeError({ status: 500 }).context).toEqual({ value: { status: 500 } })
      expect(serializeError(null).context).toEqual({ value: null })
      expect(serializeError(undefined).message).toBe("Unknown error")
    })
  })
})
