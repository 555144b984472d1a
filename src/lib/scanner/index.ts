/**
 * Scanner module - frequency distributions and field names from delimited files
 */

import { FrequencyScan, FrequencyMap } from "../../types/data-model.js";
import { MAX_FREQ_SIZE_DEFAULT } from "../../types/config.js";
import { ValidationError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { updateFrequencies } from "../../utils/frequency-map.js";
import { describeSource, readRecords } from "./record-reader.js";
import {
  DelimitedSource,
  FieldFreqOptions,
  FieldNameOptions,
} from "./types.js";

export * from "./types.js";
export * from "./record-reader.js";

function assertFieldNumber(fieldNumber: number): void {
  if (!Number.isInteger(fieldNumber) || fieldNumber < 0) {
    throw new ValidationError(
      `Field number must be a non-negative integer, got ${fieldNumber}`,
    );
  }
}

export function assertSingleChar(value: string, label: string): void {
  if (Array.from(value).length !== 1) {
    throw new ValidationError(
      `${label} must be a single character, got ${JSON.stringify(value)}`,
    );
  }
}

/**
 * Collect the frequency distribution of one field in a single pass.
 * The scan stops as soon as the map holds `maxFreqSize` distinct values
 * and reports `truncated`; every record read up to that point is counted
 * exactly once. A record too short to hold the field counts as an empty
 * (unknown) token.
 *
 * @param fieldNumber - Zero-based field position
 * @param hasHeader - Skip the first record
 *
 * @example
 * const { frequencies, truncated } = await getFieldFreq("people.csv", 1, true, ",");
 */
export async function getFieldFreq(
  source: DelimitedSource,
  fieldNumber: number,
  hasHeader: boolean,
  delimiter: string,
  options: FieldFreqOptions = {},
): Promise<FrequencyScan> {
  const maxFreqSize = options.maxFreqSize ?? MAX_FREQ_SIZE_DEFAULT;

  assertFieldNumber(fieldNumber);
  assertSingleChar(delimiter, "Delimiter");
  if (!Number.isInteger(maxFreqSize) || maxFreqSize < 1) {
    throw new ValidationError(
      `maxFreqSize must be a positive integer, got ${maxFreqSize}`,
    );
  }

  const frequencies: FrequencyMap = new Map();
  let recordNumber = 0;
  let recordsScanned = 0;
  let truncated = false;

  for await (const record of readRecords(source, {
    delimiter,
    quoteChar: options.quoteChar,
  })) {
    recordNumber++;
    if (recordNumber === 1 && hasHeader) {
      continue;
    }

    updateFrequencies(frequencies, record[fieldNumber] ?? "");
    recordsScanned++;

    if (frequencies.size >= maxFreqSize) {
      logger.warn("Frequency distribution too large, truncating", {
        source: describeSource(source),
        fieldNumber,
        maxFreqSize,
        recordsScanned,
      });
      truncated = true;
      break;
    }
  }

  logger.debug("Field frequency scan complete", {
    fieldNumber,
    distinctValues: frequencies.size,
    recordsScanned,
    truncated,
  });

  return { frequencies, truncated, recordsScanned };
}

/**
 * Name of a field: taken from the header record, or `field_num_<N>` when
 * the file has no header. Only the first record is read.
 *
 * @returns undefined for an empty file
 * @throws ValidationError when the header has no field at `fieldNumber`
 */
export async function getFieldNames(
  source: DelimitedSource,
  fieldNumber: number,
  hasHeader: boolean,
  delimiter: string,
  options: FieldNameOptions = {},
): Promise<string | undefined> {
  assertFieldNumber(fieldNumber);
  assertSingleChar(delimiter, "Delimiter");

  let first: string[] | undefined;
  for await (const record of readRecords(source, {
    delimiter,
    quoteChar: options.quoteChar,
  })) {
    first = record;
    break;
  }

  if (first === undefined) {
    return undefined;
  }

  if (!hasHeader) {
    return `field_num_${fieldNumber}`;
  }

  const name = first[fieldNumber];
  if (name === undefined) {
    throw new ValidationError(
      `Header has ${first.length} fields, no field number ${fieldNumber}`,
      { source: describeSource(source) },
    );
  }
  return name;
}
