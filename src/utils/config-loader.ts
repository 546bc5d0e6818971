/**
 * Configuration loader for flattening runs
 */

import { DEFAULT_SEPARATOR } from "../lib/flattener/types.js";
import { ConfigError } from "./errors.js";
import { isLogLevel, logger, type LogLevel } from "./logger.js";

/**
 * CLI options that affect flattening
 */
export interface FlattenCliOptions {
  separator?: string;
  logLevel?: string;
}

/**
 * Config file section for flattening
 */
export interface FlattenConfigSection {
  separator?: string;
  logLevel?: string;
}

export interface FlattenConfig {
  separator: string;
  logLevel: LogLevel;
}

export const DEFAULT_FLATTEN_CONFIG: FlattenConfig = {
  separator: DEFAULT_SEPARATOR,
  logLevel: "info",
};

/**
 * Load flattening configuration
 *
 * Precedence: CLI > config file > environment (FLATCOL_SEPARATOR, LOG_LEVEL) > defaults
 *
 * @example
 * const config = loadFlattenConfig({ separator: '.' }, { separator: '/', logLevel: 'debug' });
 * // Returns: { separator: '.', logLevel: 'debug' }
 */
export function loadFlattenConfig(
  cliOptions: FlattenCliOptions = {},
  configFile: FlattenConfigSection = {},
  env: NodeJS.ProcessEnv = process.env,
): FlattenConfig {
  const separator =
    cliOptions.separator ??
    configFile.separator ??
    env.FLATCOL_SEPARATOR ??
    DEFAULT_FLATTEN_CONFIG.separator;

  const logLevel = (
    cliOptions.logLevel ??
    configFile.logLevel ??
    env.LOG_LEVEL ??
    DEFAULT_FLATTEN_CONFIG.logLevel
  ).toLowerCase();

  if (!isLogLevel(logLevel)) {
    throw new ConfigError(
      `Log level must be one of error, warn, info, debug, got ${logLevel}`,
      { logLevel },
    );
  }

  const config: FlattenConfig = { separator, logLevel };
  validateFlattenConfig(config);

  logger.debug("Flatten config loaded", { ...config });

  return config;
}

/**
 * Validate flattening configuration
 *
 * @throws ConfigError if configuration is invalid
 */
export function validateFlattenConfig(config: FlattenConfig): void {
  if (config.separator.length === 0) {
    throw new ConfigError("Separator must not be empty");
  }

  if (!isLogLevel(config.logLevel)) {
    throw new ConfigError(
      `Log level must be one of error, warn, info, debug, got ${String(config.logLevel)}`,
    );
  }
}
