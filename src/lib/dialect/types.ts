/**
 * Dialect module types
 */

import type { ValueClassifier } from "../classifier/types.js";

/**
 * Caller-supplied facts about the file; each one skips its detection step
 */
export interface DialectHints {
  delimiter?: string;
  quoteChar?: string;
  hasHeader?: boolean;
}

export interface DialectDetectorOptions {
  /** Lines and records inspected for delimiter, quoting and header detection */
  sampleSize?: number;
  classifier?: ValueClassifier;
}

/**
 * Records read during sampling, with the columns that were quoted in each
 */
export interface RecordSample {
  records: string[][];
  quotedColumns: Set<number>[];
}
