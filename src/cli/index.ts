#!/usr/bin/env node

/**
 * Seedsmith CLI - foreign-key consistent synthetic data for relational schemas
 */

import { Command, Option } from "commander";
import { createCloneCommand } from "./commands/clone.js";
import { LOG_LEVELS, isLogLevel, logger } from "../utils/logger.js";
import { errorMessage } from "../utils/errors.js";

const pkg = {
  name: "seedsmith",
  version: "0.1.0",
  description: "Dependency-ordered, semantics-aware synthetic data generation for PostgreSQL schemas",
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
    .addOption(
      new Option("--log-level <level>", "Logging verbosity").choices([...LOG_LEVELS]).default("info"),
    )
    .hook("preAction", (thisCommand) => {
      const level: unknown = thisCommand.opts().logLevel;
      if (typeof level === "string" && isLogLevel(level)) {
        logger.setLevel(level);
      }
    });

  program.addCommand(createCloneCommand());

  return program;
}

/**
 * CLI entry point
 */
async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  logger.error("Unexpected error", { error: errorMessage(error) });
  console.error(
    JSON.stringify(
      {
        status: "error",
        error: {
          code: "UNEXPECTED_ERROR",
          message: errorMessage(error),
        },
      },
      null,
      2,
    ),
  );
  process.exit(1);
});
