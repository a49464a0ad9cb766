/**
 * Filter Module
 *
 * @module
 */

export * from "./types.js";
export * from "./builtin.js";
export * from "./pipeline.js";
export * from "./registry.js";
