/**
 * Scanner module types
 */

import type { Readable } from "stream";

/**
 * A file path (opened and closed by the scanner) or a caller-owned text stream
 */
export type DelimitedSource = string | Readable;

export interface RecordReaderOptions {
  delimiter: string;
  quoteChar?: string;
  /** Called for every field that was enclosed in quote characters */
  onQuotedField?: (recordIndex: number, column: number) => void;
}

export interface FieldFreqOptions {
  /** Distinct-key cap; the scan stops once the map reaches it */
  maxFreqSize?: number;
  quoteChar?: string;
}

export interface FieldNameOptions {
  quoteChar?: string;
}
