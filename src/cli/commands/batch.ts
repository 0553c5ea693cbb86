/**
 * Batch command - derive and rank schemas across many sample documents
 */

import { Command } from "commander";
import { BatchCommandOptions } from "../config/types.js";
import { readSampleDocuments } from "../../lib/sampler/index.js";
import { deriveSchemas } from "../../lib/aggregator/index.js";
import type {
  LenientSchema,
  SchemaMatch,
  UnmatchedDocument,
} from "../../lib/aggregator/types.js";
import type { DerivationMode } from "../../types/options.js";
import { loadBatchOptions } from "../../utils/config-loader.js";
import {
  applyLogLevel,
  loadConfig,
  parseInteger,
  reportFailure,
  serialize,
  writeOutput,
} from "./shared.js";

export interface UnmatchedSource extends UnmatchedDocument {
  source: string;
  line?: number;
}

export interface BatchResponse {
  status: "success";
  phase: "batch";
  schemas: Array<SchemaMatch | LenientSchema>;
  unmatched: UnmatchedSource[];
  summary: {
    mode: DerivationMode;
    totalDocuments: number;
    unmatchedDocuments: number;
    durationMs: number;
  };
}

/**
 * Read every input, derive the batch and build the command response
 */
export async function runBatch(
  files: readonly string[],
  options: BatchCommandOptions,
): Promise<{ response: BatchResponse; pretty: boolean; output?: string }> {
  const startTime = Date.now();

  const config = loadConfig(options.config);
  const batchOptions = loadBatchOptions(
    {
      mode: options.mode,
      recordName: options.recordName,
      maxDepth: options.maxDepth,
      maxSchemas: options.maxSchemas,
      coalesceWidening: options.coalesceWidening,
    },
    config.derive,
  );

  const { documents } = await readSampleDocuments(files, { ndjson: options.ndjson ?? false });
  const report = deriveSchemas(
    documents.map((document) => document.text),
    batchOptions,
  );

  // Point unmatched documents back at where they were read from
  const unmatched = report.unmatched.map((entry): UnmatchedSource => {
    const origin = documents[entry.index];
    return {
      ...entry,
      source: origin?.source ?? "",
      ...(origin?.line !== undefined ? { line: origin.line } : {}),
    };
  });

  return {
    response: {
      status: "success",
      phase: "batch",
      schemas: report.schemas,
      unmatched,
      summary: {
        mode: report.mode,
        totalDocuments: report.totalDocuments,
        unmatchedDocuments: unmatched.length,
        durationMs: Date.now() - startTime,
      },
    },
    pretty: options.pretty ?? config.output?.pretty ?? false,
    output: options.output ?? config.output?.path,
  };
}

async function executeBatch(files: string[], options: BatchCommandOptions): Promise<void> {
  try {
    applyLogLevel(options.logLevel);
    const { response, pretty, output } = await runBatch(files, options);
    await writeOutput(serialize(response, pretty), output);
    process.exit(0);
  } catch (error) {
    process.exit(reportFailure(error, "batch"));
  }
}

/**
 * Create batch command
 */
export function createBatchCommand(): Command {
  return new Command("batch")
    .description("Derive, group and rank schemas across sample documents")
    .argument(
      "<files...>",
      'Sample files: .ndjson/.jsonl give one document per line, others one per file ("-" for stdin)',
    )
    .option("--mode <mode>", "Conflict policy: strict or lenient")
    .option("--record-name <name>", "Name of the top-level record (default: Record)")
    .option("--max-depth <count>", "Maximum nesting depth", parseInteger)
    .option("--max-schemas <count>", "Number of ranked schemas in strict mode", parseInteger)
    .option("--coalesce-widening", "Merge schemas that differ only by numeric widening")
    .option("--ndjson", "Read every file as newline-delimited JSON")
    .option("--pretty", "Indent the JSON output")
    .option("--output <path>", "Write the result to a file instead of stdout")
    .option("--config <path>", "Path to configuration file (JSON/YAML)")
    .option("--log-level <level>", "Logging verbosity: error, warn, info, debug")
    .action(executeBatch);
}
