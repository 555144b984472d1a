/**
 * CLI configuration types
 */

import type { LogLevel } from "../../utils/logger.js";

/**
 * `profile` section of a config file
 */
export interface ProfileConfigSection {
  delimiter?: string;
  quoteChar?: string;
  hasHeader?: boolean;
  fields?: number[];
  maxFreqSize?: number;
  sampleSize?: number;
  topValues?: number;
  unknownMarkers?: string[];
  /** Value type name keyed by zero-based field number */
  declaredTypes?: Record<string, string>;
}

/**
 * Complete configuration file structure
 */
export interface FieldScopeConfig {
  profile?: ProfileConfigSection;
  logLevel?: LogLevel;
}

/**
 * CLI command options (from commander)
 */
export interface ProfileCommandOptions {
  delimiter?: string;
  quoteChar?: string;
  header?: boolean;
  fields?: string; // Comma-separated field numbers
  types?: string; // Comma-separated <field>:<type> pairs
  maxFreqSize?: number;
  sampleSize?: number;
  topValues?: number;
  unknownMarkers?: string; // Comma-separated
  config?: string;
  logLevel?: string;
}
