import { BaseError } from "@catalog/errors"

export type ConfigErrorCode = "invalid_config" | "config_source_failed"

export class ConfigError extends BaseError<ConfigErrorCode> {
  static invalid(details: string): ConfigError {
    return new ConfigError(`Configuration validation failed:\n${details}`, {
      code: "invalid_config",
      isOperational: false,
    })
  }

  static sourceFailed(source: string, cause: unknown): ConfigError {
    return new ConfigError(`Failed to load configuration source "${source}"`, {
      code: "config_source_failed",
      context: { source },
      cause,
      isOperational: false,
    })
  }
}
