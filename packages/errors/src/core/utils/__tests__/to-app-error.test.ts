import { BaseError } from "../../base-error"
import { toAppError } from "../to-app-error"

describe("toAppError", () => {
  it("returns a BaseError unchanged", () => {
    const err = new BaseError("x", { code: "storage_error" })

    expect(toAppError(err)).toBe(err)
  })

  it("returns a structural AppError unchanged", () => {
    const err = Object.assign(new Error("x"), {
      code: "remote",
      context: {},
      isRetryable: false,
      isOperational: true,
      timestamp: new Date(),
    })

    expect(toAppError(err)).toBe(err)
  })

  it("wraps a plain Error with the fallback code", () => {
    const err = new Error("db failed")
    const result = toAppError(err, "storage_error")

    expect(result).toBeInstanceOf(BaseError)
    expect(result.code).toBe("storage_error")
    expect(result.message).toBe("db failed")
    expect(result.cause).toBe(err)
    expect(result.isOperational).toBe(false)
  })

  it("defaults the fallback code to unknown", () => {
    expect(toAppError(new Error("x")).code).toBe("unknown")
  })

  it("uses a thrown string as the message", () => {
    const result = toAppError("oops")

    expect(result.message).toBe("oops")
    expect(result.context).toEqual({})
  })

  it("wraps other values in context.value", () => {
    const result = toAppError({ status: 500 })

    expect(result.message).toBe("Unknown error")
    expect(result.context).toEqual({ value: { status: 500 } })
    expect(toAppError(null).context).toEqual({ value: null })
  })
})
