/**
 * CLI configuration types
 */

import type { DeriveConfigSection } from "../../utils/config-loader.js";

export type { DeriveConfigSection };

/**
 * Output configuration
 */
export interface OutputConfig {
  /** Indent JSON output */
  pretty?: boolean;
  /** Write the result to this file instead of stdout */
  path?: string;
}

/**
 * Complete configuration file structure
 */
export interface SchemaDeriveConfig {
  derive?: DeriveConfigSection;
  output?: OutputConfig;
}

/**
 * CLI command options (from commander)
 */
export interface DeriveCommandOptions {
  mode?: string;
  recordName?: string;
  maxDepth?: number;
  pretty?: boolean;
  output?: string;
  config?: string;
  logLevel?: string;
}

export interface BatchCommandOptions extends DeriveCommandOptions {
  maxSchemas?: number;
  coalesceWidening?: boolean;
  ndjson?: boolean;
}

export interface ValidateCommandOptions {
  schema?: string;
  ndjson?: boolean;
  pretty?: boolean;
  output?: string;
  config?: string;
  logLevel?: string;
}
