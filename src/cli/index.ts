#!/usr/bin/env node

/**
 * FieldScope CLI - profile delimited text files
 */

import { Command } from "commander";
import { createProfileCommand } from "./commands/profile.js";
import { isLogLevel, logger } from "../utils/logger.js";

const pkg = {
  name: "fieldscope",
  version: "0.1.0",
  description:
    "Profile delimited text files: dialect, field types, case, lengths and value distributions",
};

/**
 * Main CLI program
 */
function createProgram(): Command {
  const program = new Command();

  program
    .name(pkg.name)
    .description(pkg.description)
    .version(pkg.version)
    .option("--log-level <level>", "Logging verbosity: error, warn, info, debug")
    .hook("preAction", (thisCommand) => {
      const level: unknown = thisCommand.opts().logLevel;
      if (isLogLevel(level)) {
        logger.setLevel(level);
      }
    });

  program.addCommand(createProfileCommand());

  return program;
}

/**
 * CLI entry point
 */
async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  logger.error("Unexpected error", { error: message });
  console.error(
    JSON.stringify(
      {
        status: "error",
        error: {
          code: "UNEXPECTED_ERROR",
          message,
        },
      },
      null,
      2,
    ),
  );
  process.exit(1);
});
