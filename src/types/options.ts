/**
 * Per-call derivation options
 */

export type DerivationMode = "strict" | "lenient";

export interface DeriveOptions {
  mode: DerivationMode;
  /** Name of the top-level record */
  recordName: string;
  /** Maximum nesting depth of arrays and records in a document */
  maxDepth: number;
}

export interface BatchOptions extends DeriveOptions {
  /** Number of ranked groups returned in strict mode */
  maxSchemas: number;
  /** Merge groups whose schemas differ only by numeric widening */
  coalesceWidening: boolean;
}

export const DEFAULT_DERIVE_OPTIONS: DeriveOptions = {
  mode: "strict",
  recordName: "record",
  maxDepth: 64,
};

export const DEFAULT_BATCH_OPTIONS: BatchOptions = {
  ...DEFAULT_DERIVE_OPTIONS,
  recordName: "Record",
  maxSchemas: 3,
  coalesceWidening: false,
};

/**
 * Context threaded through classifier, unifier, merger and synthesizer
 */
export interface DerivationContext {
  mode: DerivationMode;
  maxDepth: number;
  /** When false, strict conflicts fail instead of synthesizing a union */
  allowUnions: boolean;
}

export function createContext(
  options: Pick<DeriveOptions, "mode" | "maxDepth">,
  allowUnions = true,
): DerivationContext {
  return { mode: options.mode, maxDepth: options.maxDepth, allowUnions };
}
