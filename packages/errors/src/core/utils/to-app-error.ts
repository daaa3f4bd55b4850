import type { AppError, ErrorCode } from "../../ports/error"
import { BaseError } from "../base-error"
import { isAppError } from "./is-app-error"

/**
 * Convert any caught value to an AppError.
 *
 * AppErrors pass through unchanged. Anything else is wrapped with
 * `fallbackCode` and marked non-operational.
 */
export function toAppError(err: unknown, fallbackCode: ErrorCode = "unknown"): AppError {
  if (isAppError(err)) return err

  if (err instanceof Error) {
    return new BaseError(err.message, {
      code: fallbackCode,
      cause: err,
      isOperational: false,
    })
  }

  return new BaseError(typeof err === "string" ? err : "Unknown error", {
    code: fallbackCode,
    context: typeof err === "string" ? {} : { value: err },
    isOperational: false,
  })
}
