/**
 * Builder module - assembles the final ordered column schema
 */
export * from "./column-schema.js";
export * from "./field-order.js";
