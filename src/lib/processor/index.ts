/**
 * Processor module - ties reading, flattening and schema building together
 */
export * from "./types.js";
export * from "./message-processor.js";
