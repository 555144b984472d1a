/**
 * Classifier module types
 */

/**
 * Per-token classification contract.
 * Field statistics depend on this interface only, so an alternate
 * classifier (locale-aware numbers, other date formats) can be swapped in.
 */
export interface ValueClassifier {
  /** Empty string or one of the configured missing-data markers */
  isUnknown(token: string): boolean;
  /** Base-10 integer with an optional sign */
  isInteger(token: string): boolean;
  /** Floating-point literal that is not already an integer */
  isFloat(token: string): boolean;
  /** Matches one of the accepted date/time patterns */
  isTimestamp(token: string): boolean;
  /** Numeric value of an integer token; undefined when it does not parse */
  parseInteger(token: string): bigint | undefined;
  /** Numeric value of an integer or float token; undefined when it does not parse */
  parseFloat(token: string): number | undefined;
}

export interface ClassifierOptions {
  unknownMarkers?: readonly string[];
}
