/**
 * Flattener module - turns nested records and schemas into single-level mappings
 * sharing one key separator
 */

export * from "./types.js";
export * from "./list-renderer.js";
export * from "./record-flattener.js";
export * from "./schema-flattener.js";
