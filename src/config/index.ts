/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import { ConfigError, optionalEnv, optionalEnvBool } from "./env.js";
import { isLogLevel, LOG_LEVELS, type LogLevel } from "../logging/logger.js";

export { ConfigError } from "./env.js";

const ENVIRONMENTS = ["development", "production", "test"] as const;

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Enable debug mode */
  readonly debug: boolean;
  /** Log level */
  readonly logLevel: string;
  /** Application name */
  readonly appName: string;
  /** Directory holding the module definition JSON files */
  readonly modulesDir: string;
  /** Directory sequence files are resolved against */
  readonly dataDir: string;
}

/**
 * Load configuration from the environment.
 */
export function loadConfig(): AppConfig {
  const debug = optionalEnvBool("DEBUG", false);
  return {
    env: optionalEnv("NODE_ENV", "development"),
    debug,
    logLevel: optionalEnv("LOG_LEVEL", debug ? "debug" : "info"),
    appName: optionalEnv("APP_NAME", "sec-workflow"),
    modulesDir: optionalEnv("MODULES_DIR", "modules"),
    dataDir: optionalEnv("DATA_DIR", "data"),
  };
}

/** Application configuration singleton */
export const config: AppConfig = loadConfig();

/**
 * Validate configuration values and return the log level to use.
 * Call this at startup to fail fast.
 */
export function validateConfig(appConfig: AppConfig = config): LogLevel {
  if (!ENVIRONMENTS.some((env) => env === appConfig.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${appConfig.env}. Must be ${ENVIRONMENTS.join(", ")}.`
    );
  }

  if (!isLogLevel(appConfig.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${appConfig.logLevel}. Must be ${LOG_LEVELS.join(", ")}.`
    );
  }

  return appConfig.logLevel;
}
