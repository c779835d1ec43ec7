/**
 * Core module - the extraction engine and its store
 */

// Re-export error classes
export * from "./errors.js";

export * from "./vocabulary.js";
export * from "./interfaces/index.js";
export * from "./store/index.js";
export * from "./hierarchy/index.js";
export * from "./extraction/index.js";

// Re-export types
export * from "../types/index.js";
export * from "../types/result.js";
