/**
 * Application configuration.
 * Validates and exposes typed process-level settings. Flow configuration
 * documents are handled by the flow itself (see flow/flow-config.ts).
 */

import { tmpdir } from "node:os";
import { join } from "node:path";
import { ConfigError } from "../errors.js";
import { isLogLevel } from "../logging/logger.js";
import { optionalEnv, optionalEnvInt } from "./env.js";

export { ConfigError } from "../errors.js";
export { requireEnv, optionalEnv, optionalEnvInt, optionalEnvBool } from "./env.js";
export { loadConfigFile, parseConfigText, dumpConfigText } from "./yaml.js";

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Log level */
  readonly logLevel: string;
  /** Directory holding cross-process lock files */
  readonly lockDir: string;
  /** Maximum number of flow processes a manager runs at once */
  readonly processes: number;
}

function loadConfig(): AppConfig {
  return {
    env: optionalEnv("NODE_ENV", "development"),
    logLevel: optionalEnv("LOG_LEVEL", "info"),
    lockDir: optionalEnv("BATCHFLOW_LOCK_DIR", join(tmpdir(), "batchflow")),
    processes: optionalEnvInt("BATCHFLOW_PROCESSES", 4),
  };
}

/** Application configuration singleton */
export const config: AppConfig = loadConfig();

/**
 * Validate that all process-level configuration is usable.
 * Call this at startup to fail fast.
 */
export function validateConfig(): void {
  if (!["development", "production", "test"].includes(config.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${config.env}. Must be development, production, or test.`
    );
  }

  if (!isLogLevel(config.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${config.logLevel}. Must be debug, info, warn, or error.`
    );
  }

  if (config.processes < 1) {
    throw new ConfigError(
      `Invalid BATCHFLOW_PROCESSES: ${config.processes}. Must be at least 1.`
    );
  }
}
