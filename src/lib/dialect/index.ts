/**
 * Dialect module - physical structure of a delimited file
 */

import { open, type FileHandle } from "fs/promises";
import { DialectInfo } from "../../types/data-model.js";
import { DEFAULT_PROFILER_CONFIG } from "../../types/config.js";
import { ValidationError, toReadError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { defaultClassifier, ValueClassifier } from "../classifier/index.js";
import { assertSingleChar } from "../scanner/index.js";
import { DEFAULT_QUOTE_CHAR, readRecords } from "../scanner/record-reader.js";
import {
  classifyFormat,
  detectDelimiter,
  detectHeader,
  detectQuoting,
  mode,
} from "./sniffer.js";
import { DialectDetectorOptions, DialectHints, RecordSample } from "./types.js";

export * from "./types.js";
export * from "./sniffer.js";

const FALLBACK_DELIMITER = ",";

/**
 * Read up to `limit` non-empty raw lines from the start of a file
 */
export async function readSampleLines(
  filePath: string,
  limit: number,
): Promise<string[]> {
  const lines: string[] = [];
  let handle: FileHandle | undefined;
  try {
    handle = await open(filePath, "r");
    for await (const line of handle.readLines({ encoding: "utf8" })) {
      if (line.trim() === "") continue;
      lines.push(lines.length === 0 ? line.replace(/^\uFEFF/, "") : line);
      if (lines.length >= limit) break;
    }
  } catch (error) {
    throw toReadError(error, filePath);
  } finally {
    await handle?.close();
  }
  return lines;
}

/**
 * Parse up to `limit` records, noting which fields were quoted
 */
export async function sampleRecords(
  filePath: string,
  delimiter: string,
  quoteChar: string,
  limit: number,
): Promise<RecordSample> {
  const records: string[][] = [];
  const quotedColumns: Set<number>[] = [];

  const onQuotedField = (recordIndex: number, column: number) => {
    let columns = quotedColumns[recordIndex];
    if (!columns) {
      columns = new Set();
      quotedColumns[recordIndex] = columns;
    }
    columns.add(column);
  };

  for await (const record of readRecords(filePath, {
    delimiter,
    quoteChar,
    onQuotedField,
  })) {
    records.push(record);
    if (records.length >= limit) break;
  }

  return { records, quotedColumns: quotedColumns.slice(0, records.length) };
}

/**
 * Number of records the delimited reader yields for the whole file
 */
export async function countRecords(
  filePath: string,
  delimiter: string,
  quoteChar: string,
): Promise<number> {
  let count = 0;
  for await (const _record of readRecords(filePath, { delimiter, quoteChar })) {
    count++;
  }
  return count;
}

/**
 * Detects delimiter, quoting, header, format category and record/field counts.
 * Results are computed once by `analyze()` and cached on the instance;
 * no file handle outlives a call.
 *
 * @example
 * const detector = new DialectDetector("people.csv");
 * const dialect = await detector.analyze();
 * dialect.formatType; // "csv"
 */
export class DialectDetector {
  private readonly hints: DialectHints;
  private readonly sampleSize: number;
  private readonly classifier: ValueClassifier;
  private pending: Promise<DialectInfo> | undefined;
  private info: DialectInfo | undefined;

  constructor(
    private readonly filePath: string,
    hints: DialectHints = {},
    options: DialectDetectorOptions = {},
  ) {
    if (hints.delimiter !== undefined) {
      assertSingleChar(hints.delimiter, "Delimiter");
    }
    if (hints.quoteChar !== undefined) {
      assertSingleChar(hints.quoteChar, "Quote character");
    }
    const sampleSize = options.sampleSize ?? DEFAULT_PROFILER_CONFIG.sampleSize;
    if (!Number.isInteger(sampleSize) || sampleSize < 1) {
      throw new ValidationError(
        `sampleSize must be a positive integer, got ${sampleSize}`,
      );
    }

    this.hints = { ...hints };
    this.sampleSize = sampleSize;
    this.classifier = options.classifier ?? defaultClassifier;
  }

  /**
   * Run the analysis passes once; later calls return the cached result
   */
  analyze(): Promise<DialectInfo> {
    if (!this.pending) {
      this.pending = this.runAnalysis().then(
        (info) => {
          this.info = info;
          return info;
        },
        (error: unknown) => {
          this.pending = undefined;
          throw error;
        },
      );
    }
    return this.pending;
  }

  get isAnalyzed(): boolean {
    return this.info !== undefined;
  }

  get dialect(): DialectInfo {
    if (!this.info) {
      throw new ValidationError("Dialect not analyzed. Call analyze() first.", {
        filePath: this.filePath,
      });
    }
    return this.info;
  }

  get recordCount(): number {
    return this.dialect.recordCount;
  }

  get fieldCount(): number {
    return this.dialect.fieldCount;
  }

  get formatType(): DialectInfo["formatType"] {
    return this.dialect.formatType;
  }

  get delimiter(): string {
    return this.dialect.delimiter;
  }

  get quoting(): boolean {
    return this.dialect.quoting;
  }

  get hasHeader(): boolean {
    return this.dialect.hasHeader;
  }

  private async runAnalysis(): Promise<DialectInfo> {
    const quoteChar = this.hints.quoteChar ?? DEFAULT_QUOTE_CHAR;

    logger.info("Analyzing file dialect", {
      filePath: this.filePath,
      sampleSize: this.sampleSize,
    });

    const lines = await readSampleLines(this.filePath, this.sampleSize);
    if (lines.length === 0) {
      logger.warn("File is empty", { filePath: this.filePath });
      const empty: DialectInfo = {
        delimiter: this.hints.delimiter ?? FALLBACK_DELIMITER,
        quoteChar,
        quoting: false,
        hasHeader: this.hints.hasHeader ?? false,
        formatType: "unknown",
        recordCount: 0,
        fieldCount: 0,
      };
      return Object.freeze(empty);
    }

    const delimiter =
      this.hints.delimiter ??
      detectDelimiter(lines, quoteChar) ??
      FALLBACK_DELIMITER;

    const sample = await sampleRecords(
      this.filePath,
      delimiter,
      quoteChar,
      this.sampleSize,
    );
    const recordCount = await countRecords(this.filePath, delimiter, quoteChar);

    const hasHeader =
      this.hints.hasHeader ?? detectHeader(sample.records, this.classifier);

    const info: DialectInfo = Object.freeze({
      delimiter,
      quoteChar,
      quoting: detectQuoting(sample, hasHeader),
      hasHeader,
      formatType: classifyFormat(sample.records, lines),
      recordCount,
      fieldCount: mode(sample.records.map((record) => record.length)) ?? 0,
    });

    logger.info("Dialect analysis complete", { ...info });
    return info;
  }
}
