#!/usr/bin/env node

/**
 * schema-derive CLI - derive record schemas from sample JSON documents
 */

import { Command } from "commander";
import { createDeriveCommand } from "./commands/derive.js";
import { createBatchCommand } from "./commands/batch.js";
import { createValidateCommand } from "./commands/validate.js";
import { applyLogLevel } from "./commands/shared.js";
import { logger } from "../utils/logger.js";

const pkg = {
  name: "schema-derive",
  version: "0.1.0",
  description: "Derive record schemas from sample JSON documents",
};

/**
 * Main CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name(pkg.name)
    .description(pkg.description)
    .version(pkg.version)
    .option("--log-level <level>", "Logging verbosity: error, warn, info, debug")
    .hook("preAction", (thisCommand) => {
      const level: unknown = thisCommand.opts().logLevel;
      applyLogLevel(typeof level === "string" ? level : undefined);
    });

  program.addCommand(createDeriveCommand());
  program.addCommand(createBatchCommand());
  program.addCommand(createValidateCommand());

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
