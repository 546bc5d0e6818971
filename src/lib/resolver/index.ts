/**
 * Resolver module - maps declared type unions to storage types
 */
export * from "./type-resolver.js";
