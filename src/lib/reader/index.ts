/**
 * Reader module - line-delimited message input
 */
export * from "./types.js";
export * from "./message-parser.js";
export * from "./line-reader.js";
