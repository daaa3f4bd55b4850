import { BaseError } from "./base-error"
import { errorChain } from "./utils/error-chain"

/**
 * Raised when a load is abandoned because its consumer cancelled it.
 * Pipelines treat it as a silent stop, never as a failure to report.
 */
export class CancellationError extends BaseError<"cancelled"> {
  constructor(message = "Operation cancelled", options?: { cause?: unknown }) {
    super(message, { code: "cancelled", cause: options?.cause })
  }
}

function isAbortError(v: unknown): boolean {
  return v instanceof Error && v.name === "AbortError"
}

/**
 * True for a {@link CancellationError}, for the `AbortError` that `fetch` and
 * timers raise on an aborted signal, and for any error caused by either.
 */
export function isCancellation(err: unknown): boolean {
  return errorChain(err).some((e) => e instanceof CancellationError || isAbortError(e))
}

/**
 * Throws a {@link CancellationError} when `signal` has been aborted.
 */
export function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new CancellationError("Operation cancelled", { cause: signal.reason })
  }
}
