/**
 * Flattener module types
 */

import type { FlattenLogger } from "../../utils/logger.js";

/**
 * Joins path segments of nested fields. Schema and record flattening must share it
 * for column names to line up.
 */
export const DEFAULT_SEPARATOR = "__";

export interface FlattenOptions {
  separator?: string;
  /** Receives the missing-`type` warnings; defaults to the package logger */
  logger?: FlattenLogger;
}
