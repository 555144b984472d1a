/**
 * Field statistics - case, min/max and length extremes for one field's values.
 * Unknown tokens never take part in any statistic.
 */

import {
  FieldCase,
  FieldValues,
  ValueType,
  VALUE_TYPES,
} from "../../types/data-model.js";
import { ValidationError } from "../../utils/errors.js";
import {
  defaultClassifier,
  isValueType,
  tokensOf,
  ValueClassifier,
} from "../classifier/index.js";

type CaseVote = "unknown" | "number" | "lower" | "upper" | "mixed";

function assertNever(value: never): never {
  throw new ValidationError(`Unhandled value type: ${String(value)}`);
}

/**
 * Reject anything outside the closed ValueType set (or an absent type)
 */
function assertValueType(
  valueType: ValueType | null | undefined,
): ValueType {
  if (valueType === null || valueType === undefined) {
    return ValueType.Unknown;
  }
  if (!isValueType(valueType)) {
    throw new ValidationError(`Invalid value type: ${String(valueType)}`, {
      allowed: VALUE_TYPES,
    });
  }
  return valueType;
}

function hasCasedLetters(token: string): boolean {
  return token.toLowerCase() !== token.toUpperCase();
}

function voteCase(token: string, classifier: ValueClassifier): CaseVote {
  if (classifier.isUnknown(token)) return "unknown";
  if (classifier.isInteger(token) || classifier.isFloat(token)) return "number";
  if (hasCasedLetters(token)) {
    if (token === token.toLowerCase()) return "lower";
    if (token === token.toUpperCase()) return "upper";
  }
  return "mixed";
}

/**
 * Determine the letter case of a string field.
 * Numbers and unknown values are ignored; any non-string type is "n/a".
 *
 * @example
 * getCase(ValueType.String, ["Smith", "JONES", "thompson"]); // "mixed"
 * getCase(ValueType.Integer, ["abc"]); // "n/a"
 */
export function getCase(
  valueType: ValueType | null | undefined,
  values: FieldValues,
  classifier: ValueClassifier = defaultClassifier,
): FieldCase {
  if (valueType !== ValueType.String) {
    return "n/a";
  }

  const votes = new Set<CaseVote>();
  for (const token of tokensOf(values)) {
    votes.add(voteCase(token, classifier));
  }

  if (votes.has("mixed")) return "mixed";
  if (votes.has("lower") && !votes.has("upper")) return "lower";
  if (votes.has("upper") && !votes.has("lower")) return "upper";
  if (votes.has("lower") && votes.has("upper")) return "mixed";
  return "unknown";
}

function knownTokens(values: FieldValues, classifier: ValueClassifier): string[] {
  const known: string[] = [];
  for (const token of tokensOf(values)) {
    if (!classifier.isUnknown(token)) {
      known.push(token);
    }
  }
  return known;
}

function pickExtreme<T>(
  items: T[],
  wantMax: boolean,
  less: (a: T, b: T) => boolean,
): T | undefined {
  let best: T | undefined;
  for (const item of items) {
    if (best === undefined || (wantMax ? less(best, item) : less(item, best))) {
      best = item;
    }
  }
  return best;
}

function parsedValues<T>(
  tokens: string[],
  accept: (token: string) => boolean,
  parse: (token: string) => T | undefined,
): T[] {
  const parsed: T[] = [];
  for (const token of tokens) {
    if (!accept(token)) continue;
    const value = parse(token);
    if (value !== undefined) {
      parsed.push(value);
    }
  }
  return parsed;
}

function integerExtreme(
  tokens: string[],
  wantMax: boolean,
  classifier: ValueClassifier,
): string | undefined {
  const parsed = parsedValues(
    tokens,
    (token) => classifier.isInteger(token),
    (token) => classifier.parseInteger(token),
  );
  const best = pickExtreme(parsed, wantMax, (a, b) => a < b);
  return best === undefined ? undefined : best.toString();
}

function floatExtreme(
  tokens: string[],
  wantMax: boolean,
  classifier: ValueClassifier,
): string | undefined {
  const parsed = parsedValues(
    tokens,
    (token) => classifier.isInteger(token) || classifier.isFloat(token),
    (token) => classifier.parseFloat(token),
  );
  const best = pickExtreme(parsed, wantMax, (a, b) => a < b);
  return best === undefined ? undefined : String(best);
}

function extreme(
  valueType: ValueType | null | undefined,
  values: FieldValues,
  wantMax: boolean,
  classifier: ValueClassifier,
): string | undefined {
  const type = assertValueType(valueType);
  const tokens = knownTokens(values, classifier);

  switch (type) {
    case ValueType.Integer:
      return integerExtreme(tokens, wantMax, classifier);
    case ValueType.Float:
      return floatExtreme(tokens, wantMax, classifier);
    case ValueType.String:
    case ValueType.Timestamp:
    case ValueType.Unknown:
      return pickExtreme(tokens, wantMax, (a, b) => a < b);
    default:
      return assertNever(type);
  }
}

/**
 * Minimum known value, compared numerically for integer/float fields and
 * lexicographically otherwise. Numeric results are re-rendered as strings.
 * Tokens that do not parse as the field's type are left out.
 *
 * @returns undefined when no known value remains
 * @throws ValidationError for a value type outside the closed set
 */
export function getMin(
  valueType: ValueType | null | undefined,
  values: FieldValues,
  classifier: ValueClassifier = defaultClassifier,
): string | undefined {
  return extreme(valueType, values, false, classifier);
}

/**
 * Maximum known value; see getMin
 */
export function getMax(
  valueType: ValueType | null | undefined,
  values: FieldValues,
  classifier: ValueClassifier = defaultClassifier,
): string | undefined {
  return extreme(valueType, values, true, classifier);
}

function charLength(token: string): number {
  return Array.from(token).length;
}

/**
 * Length of the longest known value, 0 when there is none
 */
export function getMaxLength(
  values: FieldValues,
  classifier: ValueClassifier = defaultClassifier,
): number {
  let maxLength = 0;
  for (const token of knownTokens(values, classifier)) {
    maxLength = Math.max(maxLength, charLength(token));
  }
  return maxLength;
}

/**
 * Length of the shortest known value, undefined when there is none
 */
export function getMinLength(
  values: FieldValues,
  classifier: ValueClassifier = defaultClassifier,
): number | undefined {
  let minLength: number | undefined;
  for (const token of knownTokens(values, classifier)) {
    const length = charLength(token);
    if (minLength === undefined || length < minLength) {
      minLength = length;
    }
  }
  return minLength;
}
