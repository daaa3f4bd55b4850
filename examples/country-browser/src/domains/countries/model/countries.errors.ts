import { BaseError } from "@atlas/errors"
import type { Alpha3Code } from "./country.model"

export type CountriesErrorCode =
  | "network_error"
  | "decoding_error"
  | "storage_error"
  | "details_missing"

export class NetworkError extends BaseError<"network_error"> {
  static httpStatus(input: { url: string; status: number }): NetworkError {
    return new NetworkError(`Countries API responded with HTTP ${input.status}`, {
      code: "network_error",
      context: { url: input.url, status: input.status },
      isRetryable: input.status >= 500 || input.status === 429,
    })
  }

  static transport(input: { url: string; cause: unknown }): NetworkError {
    return new NetworkError("Countries API is unreachable", {
      code: "network_error",
      context: { url: input.url },
      cause: input.cause,
      isRetryable: true,
    })
  }
}

export class DecodingError extends BaseError<"decoding_error"> {
  static invalidPayload(input: { url: string; issues: string; cause?: unknown }): DecodingError {
    return new DecodingError(`Countries API returned an unexpected payload: ${input.issues}`, {
      code: "decoding_error",
      context: { url: input.url },
      cause: input.cause,
    })
  }
}

export class StorageError extends BaseError<"storage_error" | "details_missing"> {
  static failed(input: { operation: string; cause: unknown }): StorageError {
    return new StorageError(`Country store failed to ${input.operation}`, {
      code: "storage_error",
      context: { operation: input.operation },
      cause: input.cause,
      isRetryable: true,
    })
  }

  static detailsMissing(alpha3Code: Alpha3Code): StorageError {
    return new StorageError(`Details for ${alpha3Code} are missing after being stored`, {
      code: "details_missing",
      context: { alpha3Code },
      isRetryable: true,
    })
  }
}
