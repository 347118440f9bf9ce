import { BaseError } from "@mailrelay/errors"

export type ConfigErrorCode = "config_invalid" | "config_not_found" | "config_unreadable"

export class ConfigError extends BaseError<ConfigErrorCode> {
  static invalid(details: string): ConfigError {
    return new ConfigError(`Configuration validation failed:\n${details}`, {
      code: "config_invalid",
    })
  }

  static notFound(file: string): ConfigError {
    return new ConfigError("configuration file not found", {
      code: "config_not_found",
      context: { file },
    })
  }

  static unreadable(source: string, cause: unknown): ConfigError {
    return new ConfigError(`failed to read configuration from ${source}`, {
      code: "config_unreadable",
      context: { source },
      cause,
    })
  }
}
