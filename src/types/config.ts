/**
 * Configuration types for FieldScope
 */

import { ValueType } from "./data-model.js";

/**
 * Default cap on distinct entries kept in a field's frequency map
 */
export const MAX_FREQ_SIZE_DEFAULT = 10000;

/**
 * ProfilerConfig - settings for dialect detection, scanning and statistics
 */
export interface ProfilerConfig {
  /** Distinct-key cap for each frequency map */
  maxFreqSize: number;
  /** Tokens treated as missing data, matched case-insensitively */
  unknownMarkers: string[];
  /** Records sampled by the dialect detector */
  sampleSize: number;
  /** Number of most frequent values reported per field */
  topValues: number;
  quoteChar: string;
  /** Skips delimiter detection when set */
  delimiter?: string;
  /** Skips header detection when set */
  hasHeader?: boolean;
  /** Zero-based field numbers to profile; all fields when omitted */
  fields?: number[];
  /** Declared value type per zero-based field number */
  declaredTypes?: Record<number, ValueType>;
}

export const DEFAULT_UNKNOWN_MARKERS: readonly string[] = [
  "",
  "na",
  "n/a",
  "none",
  "null",
  "nil",
  "unk",
  "unknown",
  "?",
];

export const DEFAULT_PROFILER_CONFIG: ProfilerConfig = {
  maxFreqSize: MAX_FREQ_SIZE_DEFAULT,
  unknownMarkers: [...DEFAULT_UNKNOWN_MARKERS],
  sampleSize: 100,
  topValues: 10,
  quoteChar: '"',
};
