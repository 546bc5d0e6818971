/**
 * flatcol: flatten nested JSON records and schemas into typed columnar layouts
 *
 * @packageDocumentation
 */

// Core types
export * from "./types/index.js";

// Modules
export * from "./lib/flattener/index.js";
export * from "./lib/resolver/index.js";
export * from "./lib/builder/index.js";
export * from "./lib/reader/index.js";
export * from "./lib/processor/index.js";
export * from "./lib/emitter/index.js";

// Utilities
export * from "./utils/errors.js";
export * from "./utils/logger.js";
export * from "./utils/config-loader.js";
