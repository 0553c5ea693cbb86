/**
 * Normalizer module types
 */

import type { ParsedValue } from "../../types/parsed-value.js";
import type { DerivationFailure } from "../../types/result.js";

export interface NormalizerOptions {
  /** Maximum nesting depth accepted in a document */
  maxDepth: number;
}

export type NormalizedDocument =
  | { index: number; ok: true; value: ParsedValue }
  | { index: number; ok: false; error: DerivationFailure };

export interface NormalizerResult {
  documents: NormalizedDocument[];
  parsed: number;
  failed: number;
}
