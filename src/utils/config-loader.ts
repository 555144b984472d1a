/**
 * Configuration loader for the profiler
 */

import {
  DEFAULT_PROFILER_CONFIG,
  ProfilerConfig,
} from "../types/config.js";
import { ValueType } from "../types/data-model.js";
import { parseValueType } from "../lib/classifier/index.js";
import type {
  ProfileCommandOptions,
  ProfileConfigSection,
} from "../cli/config/types.js";
import { ConfigError, FieldScopeError } from "./errors.js";
import { logger } from "./logger.js";

function splitList(value: string): string[] {
  return value.split(",").map((item) => item.trim());
}

function parseFieldNumber(raw: string, source: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(`Invalid field number in ${source}: ${JSON.stringify(raw)}`);
  }
  return Number(raw);
}

function toValueType(name: string, source: string): ValueType {
  try {
    return parseValueType(name);
  } catch (error) {
    const details = error instanceof FieldScopeError ? error.details : undefined;
    throw new ConfigError(`Invalid value type in ${source}: ${name}`, details, {
      cause: error,
    });
  }
}

/**
 * Parse `--types 0:integer,3:timestamp`
 */
export function parseDeclaredTypes(value: string): Record<number, ValueType> {
  const declared: Record<number, ValueType> = {};
  for (const pair of splitList(value)) {
    const separator = pair.indexOf(":");
    if (separator === -1) {
      throw new ConfigError(
        `Invalid --types entry ${JSON.stringify(pair)}, expected <field>:<type>`,
      );
    }
    const field = parseFieldNumber(pair.slice(0, separator).trim(), "--types");
    declared[field] = toValueType(pair.slice(separator + 1), "--types");
  }
  return declared;
}

function fromConfigSection(
  declaredTypes: Record<string, string>,
): Record<number, ValueType> {
  const declared: Record<number, ValueType> = {};
  for (const [field, type] of Object.entries(declaredTypes)) {
    declared[parseFieldNumber(field, "declaredTypes")] = toValueType(
      type,
      "declaredTypes",
    );
  }
  return declared;
}

/**
 * Load profiler configuration from CLI options and config file
 *
 * @param cliOptions - CLI flags for the profile command
 * @param configFile - Optional `profile` section of a config file
 * @returns Merged configuration with defaults applied
 *
 * @example
 * const config = loadProfilerConfig({ maxFreqSize: 500 }, { maxFreqSize: 50, sampleSize: 20 });
 * // Returns: config with maxFreqSize 500 (CLI takes precedence) and sampleSize 20
 */
export function loadProfilerConfig(
  cliOptions: ProfileCommandOptions = {},
  configFile: ProfileConfigSection = {},
): ProfilerConfig {
  const fields = cliOptions.fields
    ? splitList(cliOptions.fields).map((field) => parseFieldNumber(field, "--fields"))
    : undefined;

  const unknownMarkers = cliOptions.unknownMarkers
    ? splitList(cliOptions.unknownMarkers)
    : undefined;

  const declaredTypes = cliOptions.types
    ? parseDeclaredTypes(cliOptions.types)
    : configFile.declaredTypes
      ? fromConfigSection(configFile.declaredTypes)
      : undefined;

  // Build config with precedence: CLI > config file > defaults
  const config: ProfilerConfig = {
    maxFreqSize:
      cliOptions.maxFreqSize ??
      configFile.maxFreqSize ??
      DEFAULT_PROFILER_CONFIG.maxFreqSize,

    unknownMarkers:
      unknownMarkers ??
      configFile.unknownMarkers ??
      DEFAULT_PROFILER_CONFIG.unknownMarkers,

    sampleSize:
      cliOptions.sampleSize ??
      configFile.sampleSize ??
      DEFAULT_PROFILER_CONFIG.sampleSize,

    topValues:
      cliOptions.topValues ??
      configFile.topValues ??
      DEFAULT_PROFILER_CONFIG.topValues,

    quoteChar:
      cliOptions.quoteChar ??
      configFile.quoteChar ??
      DEFAULT_PROFILER_CONFIG.quoteChar,

    delimiter: cliOptions.delimiter ?? configFile.delimiter,
    hasHeader: cliOptions.header ?? configFile.hasHeader,
    fields: fields ?? configFile.fields,
    declaredTypes,
  };

  validateProfilerConfig(config);

  logger.debug("Profiler config loaded", {
    maxFreqSize: config.maxFreqSize,
    sampleSize: config.sampleSize,
    unknownMarkers: config.unknownMarkers.length,
    delimiter: config.delimiter,
    hasHeader: config.hasHeader,
  });

  return config;
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value >= 1;
}

function isSingleChar(value: string): boolean {
  return Array.from(value).length === 1;
}

/**
 * Validate profiler configuration
 *
 * @throws ConfigError if configuration is invalid
 */
export function validateProfilerConfig(config: ProfilerConfig): void {
  if (!isPositiveInteger(config.maxFreqSize)) {
    throw new ConfigError(
      `maxFreqSize must be a positive integer, got ${config.maxFreqSize}`,
    );
  }

  if (!isPositiveInteger(config.sampleSize)) {
    throw new ConfigError(
      `sampleSize must be a positive integer, got ${config.sampleSize}`,
    );
  }

  if (!Number.isInteger(config.topValues) || config.topValues < 0) {
    throw new ConfigError(
      `topValues must be a non-negative integer, got ${config.topValues}`,
    );
  }

  if (!isSingleChar(config.quoteChar)) {
    throw new ConfigError(
      `quoteChar must be a single character, got ${JSON.stringify(config.quoteChar)}`,
    );
  }

  if (config.delimiter !== undefined) {
    if (!isSingleChar(config.delimiter)) {
      throw new ConfigError(
        `delimiter must be a single character, got ${JSON.stringify(config.delimiter)}`,
      );
    }
    if (config.delimiter === config.quoteChar) {
      throw new ConfigError("delimiter and quoteChar must differ");
    }
  }
}
