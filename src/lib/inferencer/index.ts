/**
 * Inferencer module - derives the schema of a single document
 */

import type { TypeNode } from "../../types/type-node.js";
import {
  DeriveOptions,
  DEFAULT_DERIVE_OPTIONS,
  createContext,
} from "../../types/options.js";
import { Result, ok, fail, unwrap } from "../../types/result.js";
import { ErrorCode } from "../../utils/errors.js";
import { ROOT_PATH } from "../../utils/value-path.js";
import { parseDocument } from "../normalizer/index.js";
import { renderSchema, renderTypeExpr } from "../renderer/index.js";
import type { TypeExpr } from "../renderer/types.js";
import { buildType } from "./type-builder.js";
import { DerivedSchema, DocumentInput } from "./types.js";

export * from "./types.js";
export * from "./classifier.js";
export * from "./unifier.js";
export * from "./record-merger.js";
export * from "./sequence-resolver.js";
export * from "./type-builder.js";

/**
 * Derive the type tree of one document
 */
export function tryDeriveType(
  document: DocumentInput,
  options: Partial<DeriveOptions> = {},
): Result<TypeNode> {
  const opts: DeriveOptions = { ...DEFAULT_DERIVE_OPTIONS, ...options };

  if (opts.recordName === "") {
    return fail(ErrorCode.INVALID_NAME, "Record name must not be empty", ROOT_PATH);
  }

  const value =
    typeof document === "string"
      ? parseDocument(document, { maxDepth: opts.maxDepth })
      : ok(document);
  if (!value.ok) {
    return value;
  }

  return buildType(value.value, opts.recordName, createContext(opts));
}

/**
 * Derive and render the schema of one document
 */
export function tryDeriveSchema(
  document: DocumentInput,
  options: Partial<DeriveOptions> = {},
): Result<DerivedSchema> {
  const type = tryDeriveType(document, options);
  if (!type.ok) {
    return type;
  }

  return ok({
    type: type.value,
    schema: renderTypeExpr(type.value),
    text: renderSchema(type.value),
  });
}

/**
 * Derive the schema of one document, throwing the matching
 * {@link SchemaDeriveError} subclass on failure
 */
export function deriveSchema(
  document: DocumentInput,
  options: Partial<DeriveOptions> = {},
): DerivedSchema {
  return unwrap(tryDeriveSchema(document, options));
}

export function deriveTypeExpr(
  document: DocumentInput,
  options: Partial<DeriveOptions> = {},
): TypeExpr {
  return deriveSchema(document, options).schema;
}
