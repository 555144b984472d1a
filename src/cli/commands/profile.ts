/**
 * Profile command - dialect and per-field statistics for a delimited file
 */

import { Command } from "commander";
import { ProfileCommandOptions, ProfileConfigSection } from "../config/types.js";
import { parseConfigFile } from "../config/parser.js";
import { Profiler } from "../../lib/profiler/index.js";
import { loadProfilerConfig } from "../../utils/config-loader.js";
import { isLogLevel, logger } from "../../utils/logger.js";
import { ErrorCode, FieldScopeError } from "../../utils/errors.js";

/**
 * Accept `\t` and `tab` for a tab delimiter
 */
export function parseDelimiterOption(value: string): string {
  return value === "\\t" || value.toLowerCase() === "tab" ? "\t" : value;
}

/**
 * Serialize a result for stdout; absent statistics become null
 */
export function toJson(data: unknown): string {
  return JSON.stringify(
    data,
    (_key, value: unknown) => (value === undefined ? null : value),
    2,
  );
}

/**
 * Execute profile command
 */
async function executeProfile(
  filePath: string,
  options: ProfileCommandOptions,
): Promise<void> {
  const startTime = Date.now();

  try {
    let configSection: ProfileConfigSection | undefined;
    if (options.config) {
      const fileConfig = parseConfigFile(options.config);
      configSection = fileConfig.profile;
      if (fileConfig.logLevel && !options.logLevel) {
        logger.setLevel(fileConfig.logLevel);
      }
    }

    if (options.logLevel) {
      if (!isLogLevel(options.logLevel)) {
        throw new FieldScopeError(
          ErrorCode.CONFIG_ERROR,
          `Invalid log level: ${options.logLevel}`,
        );
      }
      logger.setLevel(options.logLevel);
    }

    const config = loadProfilerConfig(options, configSection);
    logger.info("Starting profile", { filePath });

    const { profile, metadata } = await new Profiler(config).profileFile(filePath);

    const result = {
      status: "success",
      phase: "profile",
      profile,
      summary: {
        ...metadata,
        formatType: profile.dialect.formatType,
        durationMs: Date.now() - startTime,
      },
    };

    console.log(toJson(result));
    process.exit(0);
  } catch (error) {
    const scopeError =
      error instanceof FieldScopeError
        ? error
        : new FieldScopeError(
            ErrorCode.GENERAL_ERROR,
            error instanceof Error ? error.message : String(error),
            undefined,
            { cause: error },
          );

    console.error(toJson(scopeError.toResponse("profile")));

    process.exit(scopeError.code === ErrorCode.CONFIG_ERROR ? 2 : 1);
  }
}

/**
 * Create profile command
 */
export function createProfileCommand(): Command {
  const command = new Command("profile");

  command
    .description(
      "Detect the dialect of a delimited file and profile the type, case, range, lengths and frequencies of its fields",
    )
    .argument("<file>", "Delimited text file to profile")
    .option("--delimiter <char>", "Field delimiter (detected when omitted)", parseDelimiterOption)
    .option("--quote-char <char>", "Quote character (default: \")")
    .option("--header", "First record holds field names")
    .option("--no-header", "First record is data")
    .option("--fields <list>", "Zero-based field numbers to profile (comma-separated)")
    .option("--types <list>", "Declared value types, e.g. 0:integer,2:timestamp")
    .option(
      "--max-freq-size <number>",
      "Distinct values kept per field before the scan is truncated (default: 10000)",
      (val) => parseInt(val, 10),
    )
    .option(
      "--sample-size <number>",
      "Records sampled for dialect detection (default: 100)",
      (val) => parseInt(val, 10),
    )
    .option(
      "--top-values <number>",
      "Most frequent values reported per field (default: 10)",
      (val) => parseInt(val, 10),
    )
    .option("--unknown-markers <list>", "Tokens treated as missing data (comma-separated)")
    .option("--config <path>", "Path to configuration file (JSON/YAML)")
    .option("--log-level <level>", "Logging verbosity: error, warn, info, debug")
    .action(executeProfile);

  return command;
}
