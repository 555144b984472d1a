/**
 * Configuration file parser - supports JSON and YAML
 */

import { readFileSync } from "fs";
import { parse as parseYaml } from "yaml";
import { Ajv } from "ajv";
import { FieldScopeConfig } from "./types.js";
import { CONFIG_FILE_SCHEMA } from "./schema.js";
import { logger } from "../../utils/logger.js";
import { ConfigError, FileIOError } from "../../utils/errors.js";

const ajv = new Ajv({ allErrors: true });
const validateConfig = ajv.compile<FieldScopeConfig>(CONFIG_FILE_SCHEMA);

/**
 * Parse configuration file (JSON or YAML)
 */
export function parseConfigFile(filePath: string): FieldScopeConfig {
  logger.info("Parsing configuration file", { filePath });

  const isYaml = filePath.endsWith(".yaml") || filePath.endsWith(".yml");
  const isJson = filePath.endsWith(".json");

  if (!isYaml && !isJson) {
    throw new ConfigError(
      `Unsupported config file format: ${filePath}. Must be .json, .yaml, or .yml`,
    );
  }

  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new FileIOError(`Failed to read config file: ${filePath}`, undefined, {
      cause: error,
    });
  }

  let parsed: unknown;
  try {
    parsed = isYaml ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse config file: ${filePath}`, undefined, {
      cause: error,
    });
  }

  // An empty YAML document parses to null
  const candidate = parsed ?? {};
  if (!validateConfig(candidate)) {
    throw new ConfigError(`Invalid config file: ${filePath}`, {
      errors: (validateConfig.errors ?? []).map((error) => ({
        path: error.instancePath || "/",
        message: error.message,
      })),
    });
  }

  logger.info("Configuration file parsed successfully", {
    hasProfileConfig: !!candidate.profile,
  });

  return candidate;
}
