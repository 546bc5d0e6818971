/**
 * Emitter module - line-delimited output of processor results
 */
export * from "./output-writer.js";
