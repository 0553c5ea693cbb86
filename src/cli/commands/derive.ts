/**
 * Derive command - derive the schema of a single document
 */

import { Command } from "commander";
import { readFileSync } from "fs";
import { DeriveCommandOptions } from "../config/types.js";
import { deriveSchema } from "../../lib/inferencer/index.js";
import type { TypeExpr } from "../../lib/renderer/types.js";
import { DEFAULT_DERIVE_OPTIONS, type DerivationMode } from "../../types/options.js";
import { loadBatchOptions } from "../../utils/config-loader.js";
import { FileIOError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import {
  applyLogLevel,
  loadConfig,
  parseInteger,
  reportFailure,
  serialize,
  writeOutput,
} from "./shared.js";

export interface DeriveResponse {
  status: "success";
  phase: "derive";
  schema: TypeExpr;
  summary: {
    source: string;
    mode: DerivationMode;
    durationMs: number;
  };
}

function readDocument(path: string): string {
  try {
    // File descriptor 0 is stdin
    return readFileSync(path === "-" ? 0 : path, "utf8");
  } catch (err) {
    throw new FileIOError(`Failed to read document from ${path}`, { path }, { cause: err });
  }
}

/**
 * Derive the schema of one document file and build the command response
 */
export async function runDerive(
  file: string,
  options: DeriveCommandOptions,
): Promise<{ response: DeriveResponse; pretty: boolean; output?: string }> {
  const startTime = Date.now();

  const config = loadConfig(options.config);
  const deriveOptions = loadBatchOptions(
    {
      mode: options.mode,
      recordName:
        options.recordName ?? config.derive?.recordName ?? DEFAULT_DERIVE_OPTIONS.recordName,
      maxDepth: options.maxDepth,
    },
    config.derive,
  );

  const text = readDocument(file);
  const derived = deriveSchema(text, deriveOptions);

  logger.info("Schema derived", { source: file, mode: deriveOptions.mode });

  return {
    response: {
      status: "success",
      phase: "derive",
      schema: derived.schema,
      summary: {
        source: file,
        mode: deriveOptions.mode,
        durationMs: Date.now() - startTime,
      },
    },
    pretty: options.pretty ?? config.output?.pretty ?? false,
    output: options.output ?? config.output?.path,
  };
}

async function executeDerive(file: string, options: DeriveCommandOptions): Promise<void> {
  try {
    applyLogLevel(options.logLevel);
    const { response, pretty, output } = await runDerive(file, options);
    await writeOutput(serialize(response, pretty), output);
    process.exit(0);
  } catch (error) {
    process.exit(reportFailure(error, "derive"));
  }
}

/**
 * Create derive command
 */
export function createDeriveCommand(): Command {
  return new Command("derive")
    .description("Derive the record schema of one JSON document")
    .argument("<file>", 'JSON document to read (or "-" for stdin)')
    .option("--mode <mode>", "Conflict policy: strict or lenient")
    .option("--record-name <name>", "Name of the top-level record (default: record)")
    .option("--max-depth <count>", "Maximum nesting depth", parseInteger)
    .option("--pretty", "Indent the JSON output")
    .option("--output <path>", "Write the result to a file instead of stdout")
    .option("--config <path>", "Path to configuration file (JSON/YAML)")
    .option("--log-level <level>", "Logging verbosity: error, warn, info, debug")
    .action(executeDerive);
}
