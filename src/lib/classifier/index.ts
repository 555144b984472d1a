/**
 * Classifier module - decides what a single raw token represents
 */

import { ValueType, VALUE_TYPES, FieldValues } from "../../types/data-model.js";
import { DEFAULT_UNKNOWN_MARKERS } from "../../types/config.js";
import { ValidationError } from "../../utils/errors.js";
import { ClassifierOptions, ValueClassifier } from "./types.js";
import { matchesTimestamp } from "./timestamp.js";

export * from "./types.js";
export { TIMESTAMP_PATTERNS } from "./timestamp.js";

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.\d*|\.\d+|\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Build a classifier over an explicit set of missing-data markers
 *
 * @example
 * const classifier = createValueClassifier({ unknownMarkers: ["", "-"] });
 * classifier.isUnknown(" - "); // true
 */
export function createValueClassifier(
  options: ClassifierOptions = {},
): ValueClassifier {
  const markers = new Set(
    (options.unknownMarkers ?? DEFAULT_UNKNOWN_MARKERS).map((marker) =>
      marker.trim().toLowerCase(),
    ),
  );

  const isUnknown = (token: string): boolean => {
    const normalized = token.trim().toLowerCase();
    return normalized === "" || markers.has(normalized);
  };

  const isInteger = (token: string): boolean => INTEGER_PATTERN.test(token.trim());

  const isFloat = (token: string): boolean => {
    const trimmed = token.trim();
    return !INTEGER_PATTERN.test(trimmed) && FLOAT_PATTERN.test(trimmed);
  };

  const isTimestamp = (token: string): boolean => matchesTimestamp(token.trim());

  const parseInteger = (token: string): bigint | undefined => {
    const trimmed = token.trim();
    return INTEGER_PATTERN.test(trimmed)
      ? BigInt(trimmed.replace(/^\+/, ""))
      : undefined;
  };

  const parseFloat = (token: string): number | undefined => {
    const trimmed = token.trim();
    if (!FLOAT_PATTERN.test(trimmed)) return undefined;
    const value = Number(trimmed);
    return Number.isFinite(value) ? value : undefined;
  };

  return { isUnknown, isInteger, isFloat, isTimestamp, parseInteger, parseFloat };
}

/**
 * Classifier using the standard missing-data markers
 */
export const defaultClassifier: ValueClassifier = createValueClassifier();

export const isUnknown = (token: string): boolean => defaultClassifier.isUnknown(token);
export const isInteger = (token: string): boolean => defaultClassifier.isInteger(token);
export const isFloat = (token: string): boolean => defaultClassifier.isFloat(token);
export const isTimestamp = (token: string): boolean => defaultClassifier.isTimestamp(token);

/**
 * Classify one token, checking unknown -> integer -> float -> timestamp -> string
 */
export function classifyValue(
  token: string,
  classifier: ValueClassifier = defaultClassifier,
): ValueType {
  if (classifier.isUnknown(token)) return ValueType.Unknown;
  if (classifier.isInteger(token)) return ValueType.Integer;
  if (classifier.isFloat(token)) return ValueType.Float;
  if (classifier.isTimestamp(token)) return ValueType.Timestamp;
  return ValueType.String;
}

/**
 * Iterate the tokens of a field: keys of a frequency map, elements of a sequence
 */
export function tokensOf(values: FieldValues): Iterable<string> {
  return values instanceof Map ? values.keys() : values;
}

/**
 * Infer a field's value type from its distinct values.
 * Integers mixed with floats widen to float; anything mixed with
 * text, or timestamps mixed with numbers, falls back to string.
 */
export function inferFieldType(
  values: FieldValues,
  classifier: ValueClassifier = defaultClassifier,
): ValueType {
  const seen = new Set<ValueType>();

  for (const token of tokensOf(values)) {
    const type = classifyValue(token, classifier);
    if (type !== ValueType.Unknown) {
      seen.add(type);
    }
  }

  if (seen.size === 0) return ValueType.Unknown;
  if (seen.has(ValueType.String)) return ValueType.String;
  if (seen.has(ValueType.Timestamp)) {
    return seen.size === 1 ? ValueType.Timestamp : ValueType.String;
  }
  if (seen.has(ValueType.Float)) return ValueType.Float;
  return ValueType.Integer;
}

export function isValueType(value: unknown): value is ValueType {
  return typeof value === "string" && VALUE_TYPES.some((type) => type === value);
}

/**
 * Convert an external value type name into a ValueType
 *
 * @throws ValidationError for names outside the closed set
 */
export function parseValueType(name: string): ValueType {
  const normalized = name.trim().toLowerCase();
  if (!isValueType(normalized)) {
    throw new ValidationError(`Unsupported value type: ${name}`, {
      allowed: VALUE_TYPES,
    });
  }
  return normalized;
}
