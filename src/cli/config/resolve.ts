/**
 * Merge command options, config file and environment for one CLI run
 */

import { loadFlattenConfig, type FlattenConfig } from "../../utils/config-loader.js";
import { logger } from "../../utils/logger.js";
import { parseConfigFile } from "./parser.js";
import type { FlatcolConfig } from "./types.js";

export interface RunConfig {
  flatten: FlattenConfig;
  file: FlatcolConfig;
}

export function resolveRunConfig(options: {
  config?: string;
  separator?: string;
  logLevel?: string;
}): RunConfig {
  const file = options.config ? parseConfigFile(options.config) : {};
  const flatten = loadFlattenConfig(
    { separator: options.separator, logLevel: options.logLevel },
    { separator: file.separator, logLevel: file.logLevel },
  );
  logger.setLevel(flatten.logLevel);
  return { flatten, file };
}
