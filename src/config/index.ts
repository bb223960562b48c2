/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import { ConfigError, optionalEnv, optionalEnvBool } from "./env.js";
import type { LogLevel } from "../logging/logger.js";

export { ConfigError, optionalEnv, optionalEnvBool } from "./env.js";

const LOG_LEVELS: readonly string[] = ["debug", "info", "warn", "error"];

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Log level */
  readonly logLevel: string;
  /** Mirror log lines into a file under logDir */
  readonly logToFile: boolean;
  /** Directory for log files */
  readonly logDir: string;
  /** File prefix template used when none is passed explicitly */
  readonly filePrefix: string;
}

/**
 * Load configuration from the environment.
 * Values are validated separately by validateConfig().
 */
export function loadConfig(): AppConfig {
  return {
    env: optionalEnv("NODE_ENV", "development"),
    logLevel: optionalEnv("LOG_LEVEL", "info"),
    logToFile: optionalEnvBool("XDI_LOG_TO_FILE", false),
    logDir: optionalEnv("XDI_LOG_DIR", "output/logs"),
    filePrefix: optionalEnv("XDI_FILE_PREFIX", "{uid}-"),
  };
}

/** Application configuration singleton */
export const config: AppConfig = loadConfig();

/**
 * Validate configuration values.
 * Call this at application startup to fail fast.
 */
export function validateConfig(appConfig: AppConfig = config): void {
  if (!["development", "production", "test"].includes(appConfig.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${appConfig.env}. Must be development, production, or test.`
    );
  }

  if (!LOG_LEVELS.includes(appConfig.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${appConfig.logLevel}. Must be debug, info, warn, or error.`
    );
  }
}

/**
 * Narrow a configured log level string, falling back to "info".
 */
export function configuredLogLevel(appConfig: AppConfig = config): LogLevel {
  switch (appConfig.logLevel) {
    case "debug":
    case "info":
    case "warn":
    case "error":
      return appConfig.logLevel;
    default:
      return "info";
  }
}
