import { BaseError } from "@bucketcache/errors"

export class ConfigError extends BaseError<"invalid_config"> {
  static validationFailed(input: { details: string; sources: string[] }): ConfigError {
    return new ConfigError(`Configuration validation failed:\n${input.details}`, {
      code: "invalid_config",
      context: { sources: input.sources },
      isOperational: false,
    })
  }
}
