import { BaseError } from "@atlas/errors"

export type ConfigIssue = {
  path: string
  message: string
}

export class ConfigValidationError extends BaseError<"config_invalid"> {
  constructor(
    readonly issues: ConfigIssue[],
    summary: string,
  ) {
    super(`Configuration validation failed:\n${summary}`, {
      code: "config_invalid",
      context: { issues },
      isOperational: false,
    })
  }
}
