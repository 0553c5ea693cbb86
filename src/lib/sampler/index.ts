/**
 * Sampler module - reads sample documents from files or stdin
 */

import { createReadStream } from "fs";
import { access, readFile } from "fs/promises";
import { extname } from "path";
import * as readline from "readline";
import { Readable } from "stream";
import { FileIOError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { SampleDocument, SamplerOptions, SamplerResult } from "./types.js";

export * from "./types.js";

export const STDIN_SOURCE = "-";

const LINE_DELIMITED_EXTENSIONS = new Set([".ndjson", ".jsonl"]);

const DEFAULT_OPTIONS: SamplerOptions = {
  ndjson: false,
};

export function isLineDelimited(path: string, options: Partial<SamplerOptions> = {}): boolean {
  return (
    path === STDIN_SOURCE ||
    (options.ndjson ?? DEFAULT_OPTIONS.ndjson) ||
    LINE_DELIMITED_EXTENSIONS.has(extname(path).toLowerCase())
  );
}

function describeReadError(path: string, err: unknown): FileIOError {
  const code =
    err instanceof Error && "code" in err && typeof err.code === "string" ? err.code : undefined;
  const message =
    code === "ENOENT" ? `Input file not found at: ${path}` : `Failed to read input from ${path}`;
  return new FileIOError(message, { path }, { cause: err });
}

/**
 * Yield one document per non-blank line of a stream
 */
export async function* streamNdjsonLines(
  input: Readable,
  source: string,
): AsyncIterableIterator<SampleDocument> {
  const rl = readline.createInterface({
    input,
    crlfDelay: Infinity,
  });

  let line = 0;
  for await (const raw of rl) {
    line++;
    const text = raw.trim();
    if (text === "") continue;
    yield { text, source, line };
  }
}

async function readLineDelimited(path: string): Promise<SampleDocument[]> {
  const documents: SampleDocument[] = [];
  try {
    if (path !== STDIN_SOURCE) {
      await access(path);
    }
    const input =
      path === STDIN_SOURCE ? process.stdin : createReadStream(path, { encoding: "utf8" });
    for await (const document of streamNdjsonLines(input, path)) {
      documents.push(document);
    }
  } catch (err) {
    throw describeReadError(path, err);
  }
  return documents;
}

async function readWholeFile(path: string): Promise<SampleDocument[]> {
  try {
    const text = await readFile(path, "utf8");
    return [{ text, source: path }];
  } catch (err) {
    throw describeReadError(path, err);
  }
}

/**
 * Read documents from every path in order. Line-delimited sources yield one
 * document per non-blank line, any other file is a single document.
 */
export async function readSampleDocuments(
  paths: readonly string[],
  options: Partial<SamplerOptions> = {},
): Promise<SamplerResult> {
  const documents: SampleDocument[] = [];

  for (const path of paths) {
    const read = isLineDelimited(path, options)
      ? await readLineDelimited(path)
      : await readWholeFile(path);
    logger.debug("Read sample documents", { source: path, documents: read.length });
    documents.push(...read);
  }

  logger.info("Sampling completed", {
    documentsRetrieved: documents.length,
    sources: paths.length,
  });

  return {
    documents,
    metadata: {
      totalSampled: documents.length,
      sources: [...paths],
    },
  };
}
