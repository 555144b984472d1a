// Core re-exports for FieldScope types
// This file provides a single import point for all project types

export * from "./data-model.js";
export * from "./config.js";
export * from "../lib/classifier/types.js";
export * from "../lib/scanner/types.js";
export * from "../lib/dialect/types.js";
export * from "../lib/profiler/types.js";
