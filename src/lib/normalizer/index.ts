/**
 * Normalizer module - turns JSON document text into ParsedValue trees
 */

import { parse } from "lossless-json";
import { ParsedValue } from "../../types/parsed-value.js";
import { Result, fail } from "../../types/result.js";
import { DEFAULT_DERIVE_OPTIONS } from "../../types/options.js";
import { ErrorCode } from "../../utils/errors.js";
import { ROOT_PATH } from "../../utils/value-path.js";
import { logger } from "../../utils/logger.js";
import { mapValue } from "./value-mappers.js";
import {
  NormalizerOptions,
  NormalizerResult,
  NormalizedDocument,
} from "./types.js";

export * from "./types.js";
export * from "./value-mappers.js";

const DEFAULT_OPTIONS: NormalizerOptions = {
  maxDepth: DEFAULT_DERIVE_OPTIONS.maxDepth,
};

const PROTO_KEY = "__proto__";

/**
 * lossless-json assigns keys onto plain objects, so a `__proto__` key
 * replaces the prototype instead of becoming a field. JSON.parse keeps it
 * as an own property, which the reviver sees under any escaping.
 */
function hasProtoKey(text: string): boolean {
  if (!text.includes(PROTO_KEY) && !text.includes("\\u")) {
    return false;
  }
  let found = false;
  JSON.parse(text, (key: string, value: unknown) => {
    if (key === PROTO_KEY) {
      found = true;
    }
    return value;
  });
  return found;
}

/**
 * Parse one JSON document, keeping number literals exact
 */
export function parseDocument(
  text: string,
  options: Partial<NormalizerOptions> = {},
): Result<ParsedValue> {
  const { maxDepth } = { ...DEFAULT_OPTIONS, ...options };

  let raw: unknown;
  let reservedKey: boolean;
  try {
    raw = parse(text);
    reservedKey = hasProtoKey(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return fail(ErrorCode.INPUT_READ_ERROR, `Invalid JSON document: ${reason}`, ROOT_PATH);
  }

  if (reservedKey) {
    return fail(
      ErrorCode.INVALID_NAME,
      `Field name "${PROTO_KEY}" is not supported`,
      ROOT_PATH,
      PROTO_KEY,
    );
  }

  return mapValue(raw, maxDepth);
}

/**
 * Parse a batch of document texts, keeping each outcome at its original index
 */
export function normalizeDocuments(
  texts: readonly string[],
  options: Partial<NormalizerOptions> = {},
): NormalizerResult {
  const documents: NormalizedDocument[] = texts.map((text, index) => {
    const result = parseDocument(text, options);
    return result.ok
      ? { index, ok: true, value: result.value }
      : { index, ok: false, error: result.error };
  });

  const parsed = documents.filter((doc) => doc.ok).length;

  logger.debug("Normalization complete", {
    documents: texts.length,
    parsed,
    failed: texts.length - parsed,
  });

  return { documents, parsed, failed: texts.length - parsed };
}
