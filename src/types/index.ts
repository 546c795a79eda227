/**
 * Core types
 */

export * from "./value.js";
export * from "./type-graph.js";
export * from "./config.js";
