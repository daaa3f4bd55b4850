export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to an error: the query, the HTTP status, the
 * store key. Kept out of the message so logs stay queryable.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode
  readonly context: ErrorContext

  /** The same request may succeed if issued again later. */
  readonly isRetryable: boolean

  /**
   * `true` for failures expected at runtime (remote down, bad payload, store
   * unreachable); `false` for invariant violations that point at a bug.
   */
  readonly isOperational: boolean

  readonly timestamp: Date
  readonly cause?: unknown
}

/**
 * JSON-safe error shape used in log entries.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  isRetryable: boolean
  cause?: SerializedError
  stack?: string
}>
