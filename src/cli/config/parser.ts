/**
 * Configuration file parser - supports JSON and YAML
 */

import { readFileSync } from "fs";
import { parse as parseYaml } from "yaml";
import { ConfigError, FileIOError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import type { FlatcolConfig } from "./types.js";

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(
  source: Record<string, unknown>,
  key: string,
  filePath: string,
): string | undefined {
  const value = source[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new ConfigError(`Config field "${key}" must be a string in ${filePath}`);
  }
  return value;
}

/**
 * Narrow parsed file content to the config shape
 */
export function toFlatcolConfig(raw: unknown, filePath: string): FlatcolConfig {
  if (raw === null || raw === undefined) {
    return {};
  }
  if (!isPlainObject(raw)) {
    throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
  }

  const config: FlatcolConfig = {
    separator: optionalString(raw, "separator", filePath),
    logLevel: optionalString(raw, "logLevel", filePath),
  };

  const schema = raw.schema;
  if (schema !== undefined) {
    if (!isPlainObject(schema)) {
      throw new ConfigError(`Config section "schema" must be a mapping in ${filePath}`);
    }
    const order = schema.order;
    if (order !== undefined) {
      if (!Array.isArray(order) || !order.every((f) => typeof f === "string")) {
        throw new ConfigError(`Config field "schema.order" must be a list of strings in ${filePath}`);
      }
      config.schema = { order };
    } else {
      config.schema = {};
    }
  }

  return config;
}

/**
 * Parse configuration file (JSON or YAML)
 */
export function parseConfigFile(filePath: string): FlatcolConfig {
  logger.info("Parsing configuration file", { filePath });

  // Determine format from file extension
  const isYaml = filePath.endsWith(".yaml") || filePath.endsWith(".yml");
  const isJson = filePath.endsWith(".json");

  if (!isYaml && !isJson) {
    throw new ConfigError(
      `Unsupported config file format: ${filePath}. Must be .json, .yaml, or .yml`,
    );
  }

  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new FileIOError(`Failed to read config file: ${filePath}`, undefined, {
      cause: error,
    });
  }

  let raw: unknown;
  try {
    raw = isYaml ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse config file: ${filePath}`, undefined, {
      cause: error,
    });
  }

  const config = toFlatcolConfig(raw, filePath);

  logger.debug("Configuration file parsed", {
    hasSeparator: config.separator !== undefined,
    hasLogLevel: config.logLevel !== undefined,
    hasSchemaSection: config.schema !== undefined,
  });

  return config;
}
