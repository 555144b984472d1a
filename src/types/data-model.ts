/**
 * Core data model for FieldScope
 * Results are plain values with no reference back to the file they came from.
 */

/**
 * Value type of a field. Governs how tokens are converted for min/max comparison.
 */
export enum ValueType {
  Unknown = "unknown",
  Integer = "integer",
  Float = "float",
  Timestamp = "timestamp",
  String = "string",
}

export const VALUE_TYPES: readonly ValueType[] = [
  ValueType.Unknown,
  ValueType.Integer,
  ValueType.Float,
  ValueType.Timestamp,
  ValueType.String,
];

/**
 * Letter-case classification of a string field
 */
export type FieldCase = "mixed" | "lower" | "upper" | "unknown" | "n/a";

/**
 * Distinct token -> occurrence count
 */
export type FrequencyMap = Map<string, number>;

/**
 * Values of one field: either a frequency map (keys are inspected) or a plain sequence
 */
export type FieldValues = FrequencyMap | Iterable<string>;

/**
 * Result of a bounded frequency scan over one field
 */
export interface FrequencyScan {
  frequencies: FrequencyMap;
  /** The map reached its size cap and the scan stopped early */
  truncated: boolean;
  /** Data records counted, header excluded */
  recordsScanned: number;
}

export type FormatType = "csv" | "fixed" | "unknown";

/**
 * Physical structure of a delimited file
 */
export interface DialectInfo {
  delimiter: string;
  quoteChar: string;
  quoting: boolean;
  hasHeader: boolean;
  formatType: FormatType;
  /** Records the delimited reader yields, header included */
  recordCount: number;
  fieldCount: number;
}

export interface ValueCount {
  value: string;
  count: number;
}

/**
 * Statistics for one field of a file
 */
export interface FieldProfile {
  fieldNumber: number;
  name: string;
  valueType: ValueType;
  case: FieldCase;
  min: string | undefined;
  max: string | undefined;
  /** Undefined when the field holds no known value */
  minLength: number | undefined;
  maxLength: number;
  uniqueCount: number;
  unknownCount: number;
  truncated: boolean;
  topValues: ValueCount[];
}

export interface FileProfile {
  filePath: string;
  dialect: DialectInfo;
  fields: FieldProfile[];
}
