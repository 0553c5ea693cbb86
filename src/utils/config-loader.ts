/**
 * Configuration loader for derivation settings
 */

import {
  BatchOptions,
  DerivationMode,
  DEFAULT_BATCH_OPTIONS,
} from "../types/options.js";
import { ConfigError } from "./errors.js";
import { logger } from "./logger.js";

/**
 * CLI options for derivation
 */
export interface DeriveCliOptions {
  mode?: string;
  recordName?: string;
  maxDepth?: number;
  maxSchemas?: number;
  coalesceWidening?: boolean;
}

/**
 * Config file section for derivation
 */
export interface DeriveConfigSection {
  mode?: DerivationMode;
  recordName?: string;
  maxDepth?: number;
  maxSchemas?: number;
  coalesceWidening?: boolean;
}

export function isDerivationMode(value: string): value is DerivationMode {
  return value === "strict" || value === "lenient";
}

function resolveMode(cliMode: string | undefined, fileMode: DerivationMode | undefined): DerivationMode {
  if (cliMode === undefined) {
    return fileMode ?? DEFAULT_BATCH_OPTIONS.mode;
  }
  if (!isDerivationMode(cliMode)) {
    throw new ConfigError(`Mode must be "strict" or "lenient", got "${cliMode}"`, {
      mode: cliMode,
    });
  }
  return cliMode;
}

/**
 * Load derivation options from CLI options and config file
 *
 * @example
 * const options = loadBatchOptions({ mode: "lenient" }, { mode: "strict", maxSchemas: 5 });
 * // mode: "lenient" (CLI takes precedence), maxSchemas: 5
 */
export function loadBatchOptions(
  cliOptions: DeriveCliOptions = {},
  configFile: DeriveConfigSection = {},
): BatchOptions {
  // Precedence: CLI > config file > defaults
  const options: BatchOptions = {
    mode: resolveMode(cliOptions.mode, configFile.mode),
    recordName:
      cliOptions.recordName ?? configFile.recordName ?? DEFAULT_BATCH_OPTIONS.recordName,
    maxDepth: cliOptions.maxDepth ?? configFile.maxDepth ?? DEFAULT_BATCH_OPTIONS.maxDepth,
    maxSchemas:
      cliOptions.maxSchemas ?? configFile.maxSchemas ?? DEFAULT_BATCH_OPTIONS.maxSchemas,
    coalesceWidening:
      cliOptions.coalesceWidening ??
      configFile.coalesceWidening ??
      DEFAULT_BATCH_OPTIONS.coalesceWidening,
  };

  validateBatchOptions(options);

  logger.debug("Derivation config loaded", { ...options });

  return options;
}

/**
 * @throws ConfigError if an option is out of range
 */
export function validateBatchOptions(options: BatchOptions): void {
  if (options.recordName === "") {
    throw new ConfigError("Record name must not be empty");
  }

  if (!Number.isInteger(options.maxDepth) || options.maxDepth < 1) {
    throw new ConfigError(`maxDepth must be a positive integer, got ${options.maxDepth}`);
  }

  if (!Number.isInteger(options.maxSchemas) || options.maxSchemas < 1) {
    throw new ConfigError(`maxSchemas must be a positive integer, got ${options.maxSchemas}`);
  }
}
