/**
 * FieldScope: dialect detection and field profiling for delimited text files
 *
 * @packageDocumentation
 */

// Core types
export * from "./types/index.js";

// Modules
export * from "./lib/classifier/index.js";
export * from "./lib/field-stats/index.js";
export * from "./lib/scanner/index.js";
export * from "./lib/dialect/index.js";
export * from "./lib/profiler/index.js";

// Utilities
export * from "./utils/errors.js";
export * from "./utils/logger.js";
export * from "./utils/frequency-map.js";
export * from "./utils/config-loader.js";
export { parseConfigFile } from "./cli/config/parser.js";
export type {
  FieldScopeConfig,
  ProfileConfigSection,
} from "./cli/config/types.js";
