/**
 * Heuristics over sampled lines and records: delimiter, format, quoting, header
 */

import type { FormatType } from "../../types/data-model.js";
import type { ValueClassifier } from "../classifier/types.js";
import type { RecordSample } from "./types.js";

export const DELIMITER_CANDIDATES: readonly string[] = [",", "\t", "|", ";", ":"];

/**
 * Count delimiter occurrences that sit outside quoted sections
 */
export function countOutsideQuotes(
  line: string,
  delimiter: string,
  quoteChar: string,
): number {
  let count = 0;
  let inQuotes = false;
  for (const char of line) {
    if (char === quoteChar) {
      inQuotes = !inQuotes;
    } else if (char === delimiter && !inQuotes) {
      count++;
    }
  }
  return count;
}

/**
 * Most common value; on a tie, the value that reached the count first
 */
export function mode(values: number[]): number | undefined {
  const counts = new Map<number, number>();
  let best: number | undefined;
  let bestCount = 0;
  for (const value of values) {
    const count = (counts.get(value) ?? 0) + 1;
    counts.set(value, count);
    if (count > bestCount) {
      best = value;
      bestCount = count;
    }
  }
  return best;
}

/**
 * Pick the candidate that splits the sample most consistently.
 * Consistency is the share of lines hitting the modal field count; ties
 * go to the earlier candidate, whatever field count each produces.
 *
 * @returns null when no candidate splits any line
 */
export function detectDelimiter(
  lines: string[],
  quoteChar: string,
  candidates: readonly string[] = DELIMITER_CANDIDATES,
): string | null {
  let bestDelimiter: string | null = null;
  let bestConsistency = 0;

  for (const delimiter of candidates) {
    const fieldCounts = lines.map(
      (line) => countOutsideQuotes(line, delimiter, quoteChar) + 1,
    );
    const modal = mode(fieldCounts);
    if (modal === undefined || modal <= 1) continue;

    const consistency =
      fieldCounts.filter((count) => count === modal).length / fieldCounts.length;

    if (consistency > bestConsistency) {
      bestConsistency = consistency;
      bestDelimiter = delimiter;
    }
  }

  return bestDelimiter;
}

/**
 * csv: every record has the same field count, greater than one.
 * fixed: single-field records whose lines all share one length.
 */
export function classifyFormat(records: string[][], lines: string[]): FormatType {
  const first = records[0];
  if (first === undefined) return "unknown";

  const fieldCount = first.length;
  const regular = records.every((record) => record.length === fieldCount);

  if (regular && fieldCount > 1) return "csv";

  const firstLine = lines[0];
  if (
    regular &&
    fieldCount === 1 &&
    firstLine !== undefined &&
    lines.length > 1 &&
    lines.every((line) => line.length === firstLine.length)
  ) {
    return "fixed";
  }

  return "unknown";
}

/**
 * True when some column has every non-empty sampled value quoted.
 * A header record takes no part in the vote.
 */
export function detectQuoting(sample: RecordSample, hasHeader = false): boolean {
  const width = Math.max(0, ...sample.records.map((record) => record.length));
  const firstData = hasHeader ? 1 : 0;

  for (let column = 0; column < width; column++) {
    let filled = 0;
    let quoted = 0;
    sample.records.forEach((record, index) => {
      if (index < firstData) return;
      const value = record[column];
      if (value === undefined || value === "") return;
      filled++;
      if (sample.quotedColumns[index]?.has(column)) quoted++;
    });
    if (filled > 0 && quoted === filled) {
      return true;
    }
  }

  return false;
}

/**
 * Column voting on whether the first record names the fields.
 * A numeric column under a non-numeric first value, or a fixed-length
 * column under a first value of another length, votes for a header;
 * the same shapes matching the first value vote against.
 */
export function detectHeader(
  records: string[][],
  classifier: ValueClassifier,
): boolean {
  const [first, ...data] = records;
  if (first === undefined || data.length === 0) return false;

  const isNumeric = (value: string) =>
    classifier.isInteger(value) || classifier.isFloat(value);

  let votes = 0;
  first.forEach((headerValue, column) => {
    const values: string[] = [];
    for (const record of data) {
      const value = record[column];
      if (value !== undefined && !classifier.isUnknown(value)) {
        values.push(value);
      }
    }
    if (values.length === 0) return;

    if (values.every(isNumeric)) {
      votes += isNumeric(headerValue) ? -1 : 1;
      return;
    }

    const lengths = new Set(values.map((value) => value.length));
    if (lengths.size === 1) {
      votes += lengths.has(headerValue.length) ? -1 : 1;
    }
  });

  return votes > 0;
}
