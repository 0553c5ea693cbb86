/**
 * Validate command - check sample documents against a derived schema
 */

import { Command } from "commander";
import { readFile } from "fs/promises";
import { ValidateCommandOptions } from "../config/types.js";
import { readSchema } from "../../lib/renderer/index.js";
import { readSampleDocuments } from "../../lib/sampler/index.js";
import { validateDocuments } from "../../lib/validator/index.js";
import type { ConformanceReport } from "../../lib/validator/types.js";
import { unwrap } from "../../types/result.js";
import { ConfigError, FileIOError, InputReadError } from "../../utils/errors.js";
import {
  applyLogLevel,
  loadConfig,
  reportFailure,
  serialize,
  writeOutput,
} from "./shared.js";

export interface ValidateResponse {
  status: "success";
  phase: "validation";
  report: ConformanceReport & { overallPassed: boolean };
}

async function loadSchemaFile(path: string): Promise<string> {
  try {
    return await readFile(path, "utf8");
  } catch (err) {
    throw new FileIOError(`Schema not found at: ${path}`, { path }, { cause: err });
  }
}

/**
 * Validate sample files against a schema file and build the command response
 */
export async function runValidate(
  files: readonly string[],
  options: ValidateCommandOptions,
): Promise<{ response: ValidateResponse; pretty: boolean; output?: string }> {
  if (options.schema === undefined) {
    throw new ConfigError("Missing required option: --schema");
  }

  const config = loadConfig(options.config);
  const schema = unwrap(readSchema(await loadSchemaFile(options.schema)));

  const { documents } = await readSampleDocuments(files, { ndjson: options.ndjson ?? false });
  if (documents.length === 0) {
    throw new InputReadError("No documents found in input");
  }

  const report = validateDocuments(
    documents.map((document) => document.text),
    schema,
  );

  return {
    response: {
      status: "success",
      phase: "validation",
      report: { ...report, overallPassed: report.invalidDocuments === 0 },
    },
    pretty: options.pretty ?? config.output?.pretty ?? false,
    output: options.output ?? config.output?.path,
  };
}

async function executeValidate(files: string[], options: ValidateCommandOptions): Promise<void> {
  try {
    applyLogLevel(options.logLevel);
    const { response, pretty, output } = await runValidate(files, options);
    await writeOutput(serialize(response, pretty), output);
    process.exit(response.report.overallPassed ? 0 : 1);
  } catch (error) {
    process.exit(reportFailure(error, "validation"));
  }
}

/**
 * Create validate command
 */
export function createValidateCommand(): Command {
  return new Command("validate")
    .description("Validate sample documents against a derived schema")
    .argument("<files...>", 'Sample files to validate ("-" for stdin)')
    .requiredOption("--schema <path>", "Path to a rendered schema file")
    .option("--ndjson", "Read every file as newline-delimited JSON")
    .option("--pretty", "Indent the JSON output")
    .option("--output <path>", "Write the report to a file instead of stdout")
    .option("--config <path>", "Path to configuration file (JSON/YAML)")
    .option("--log-level <level>", "Logging verbosity: error, warn, info, debug")
    .action(executeValidate);
}
