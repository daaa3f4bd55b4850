export { BaseError, type BaseErrorOptions, type SerializeOptions, serializeError } from "./core/base-error"
export { CancellationError, isCancellation, throwIfCancelled } from "./core/cancellation-error"
export { errorChain } from "./core/utils/error-chain"
export { isAppError } from "./core/utils/is-app-error"
export { toAppError } from "./core/utils/to-app-error"
export type { AppError, ErrorCode, ErrorContext, SerializedError } from "./ports/error"
