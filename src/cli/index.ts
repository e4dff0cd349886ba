#!/usr/bin/env node

/**
 * estate-etl CLI - Data-quality pipeline for real-estate listing files
 */

import { Command } from "commander";
import { createRunCommand } from "./commands/run.js";
import { createValidateCommand } from "./commands/validate.js";
import { createGenerateCommand } from "./commands/generate.js";
import { isLogLevel, logger } from "../utils/logger.js";

const pkg = {
  name: "estate-etl",
  version: "0.1.0",
  description:
    "Extract, validate, enrich and load real-estate listings with a processing report",
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
    .option("--log-level <level>", "Logging verbosity: error, warn, info, debug", "info")
    .hook("preAction", (thisCommand) => {
      const level: unknown = thisCommand.opts().logLevel;
      if (typeof level === "string" && isLogLevel(level)) {
        logger.setLevel(level);
      }
    });

  // Add commands
  program.addCommand(createRunCommand());
  program.addCommand(createValidateCommand());
  program.addCommand(createGenerateCommand());

  return program;
}

/**
 * CLI entry point
 */
async function main(): Promise<void> {
  const program = createProgram();

  // Parse arguments
  await program.parseAsync(process.argv);
}

// Run CLI
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
