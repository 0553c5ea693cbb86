/**
 * Helpers shared by the CLI commands
 */

import { mkdir, writeFile } from "fs/promises";
import { dirname } from "path";
import { SchemaDeriveConfig } from "../config/types.js";
import { parseConfigFile } from "../config/parser.js";
import {
  ConfigError,
  ErrorCode,
  FileIOError,
  toSchemaDeriveError,
} from "../../utils/errors.js";
import { isLogLevel, logger } from "../../utils/logger.js";

export function applyLogLevel(level: string | undefined): void {
  if (level === undefined) {
    return;
  }
  if (!isLogLevel(level)) {
    throw new ConfigError(`Log level must be one of error, warn, info, debug, got "${level}"`);
  }
  logger.setLevel(level);
}

export function loadConfig(path: string | undefined): SchemaDeriveConfig {
  return path === undefined ? {} : parseConfigFile(path);
}

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigError(`Expected an integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Write output to a file, or to stdout when no path is given
 */
export async function writeOutput(text: string, path: string | undefined): Promise<void> {
  if (path === undefined || path === "stdout") {
    console.log(text);
    return;
  }

  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, `${text}\n`, "utf8");
  } catch (err) {
    throw new FileIOError(`Failed to write output to ${path}`, { path }, { cause: err });
  }
}

export function serialize(value: unknown, pretty: boolean): string {
  return pretty ? JSON.stringify(value, null, 2) : JSON.stringify(value);
}

/**
 * Print the error response for a failed command and return its exit code
 */
export function reportFailure(error: unknown, phase: string): number {
  const deriveError = toSchemaDeriveError(error);
  console.error(JSON.stringify(deriveError.toResponse(phase), null, 2));
  return deriveError.code === ErrorCode.CONFIG_ERROR ? 2 : 1;
}
