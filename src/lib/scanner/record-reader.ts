/**
 * Streaming delimited-record reader built on csv-parse
 */

import { createReadStream } from "fs";
import { parse, type Options as CsvParseOptions } from "csv-parse";
import { ParseError, toReadError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { DelimitedSource, RecordReaderOptions } from "./types.js";

export const DEFAULT_QUOTE_CHAR = '"';

/**
 * csv-parse options shared by every pass over a file, so record counts and
 * field extraction agree with each other
 */
export function buildParserOptions(options: RecordReaderOptions): CsvParseOptions {
  const parserOptions: CsvParseOptions = {
    delimiter: options.delimiter,
    quote: options.quoteChar ?? DEFAULT_QUOTE_CHAR,
    bom: true,
    relax_column_count: true,
    relax_quotes: true,
    skip_empty_lines: true,
  };

  const { onQuotedField } = options;
  if (onQuotedField) {
    // context.records is the zero-based index of the record being built
    parserOptions.cast = (value, context) => {
      if (context.quoting && typeof context.column === "number") {
        onQuotedField(context.records, context.column);
      }
      return value;
    };
  }

  return parserOptions;
}

export function describeSource(source: DelimitedSource): string {
  return typeof source === "string" ? source : "<stream>";
}

/**
 * Narrow a parsed record to its string tokens
 */
export function toTokens(record: unknown): string[] {
  if (!Array.isArray(record)) {
    throw new ParseError("Delimited reader produced a non-array record", {
      record,
    });
  }
  return record.map((token) => String(token));
}

/**
 * Yield records one at a time in a single sequential pass.
 * A path source is opened here and closed on every exit path, including a
 * consumer that stops iterating early. A stream source is only unpiped.
 *
 * @throws FileIOError when the file cannot be read
 * @throws ParseError when the content cannot be split into records
 */
export async function* readRecords(
  source: DelimitedSource,
  options: RecordReaderOptions,
): AsyncGenerator<string[], void, undefined> {
  const owned = typeof source === "string";
  const input = typeof source === "string"
    ? createReadStream(source, { encoding: "utf8" })
    : source;
  const parser = parse(buildParserOptions(options));

  const forwardError = (error: Error) => parser.destroy(error);
  input.once("error", forwardError);
  input.pipe(parser);

  logger.debug("Reading delimited records", {
    source: describeSource(source),
    delimiter: options.delimiter,
  });

  try {
    for await (const record of parser) {
      yield toTokens(record);
    }
  } catch (error) {
    throw toReadError(error, describeSource(source));
  } finally {
    input.off("error", forwardError);
    input.unpipe(parser);
    parser.destroy();
    if (owned) {
      input.destroy();
    }
  }
}
