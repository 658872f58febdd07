/**
 * Application configuration.
 * Reads the environment once and exposes typed values.
 */

import {
  ConfigError,
  optionalEnv,
  optionalEnvBool,
  optionalEnvChoice,
} from "./env.js";
import type { LogLevel } from "../logging/index.js";

export { ConfigError } from "./env.js";

// Username configuration (per-site accounts)
export * from "./usernames/index.js";

export const APP_ENVIRONMENTS = ["development", "production", "test"] as const;
export type AppEnvironment = (typeof APP_ENVIRONMENTS)[number];

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: AppEnvironment;
  /** Minimum log level */
  readonly logLevel: LogLevel;
  /** Directory for log files */
  readonly logDir: string;
  /** Whether log entries are also appended to a file */
  readonly logToFile: boolean;
  /** Application name, used in log file names */
  readonly appName: string;
}

/**
 * Load and validate application configuration from the environment.
 *
 * @throws ConfigError if any variable holds a value outside its allowed set
 */
export function loadAppConfig(): AppConfig {
  const appName = optionalEnv("APP_NAME", "gallery-upload");
  if (appName.trim() === "") {
    throw new ConfigError("APP_NAME must not be blank.");
  }

  return Object.freeze({
    env: optionalEnvChoice("NODE_ENV", APP_ENVIRONMENTS, "development"),
    logLevel: optionalEnvChoice("LOG_LEVEL", LOG_LEVELS, "info"),
    logDir: optionalEnv("LOG_DIR", "output/logs"),
    logToFile: optionalEnvBool("LOG_TO_FILE", false),
    appName,
  });
}
