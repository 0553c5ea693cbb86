/**
 * Multi-message aggregator - derives one schema per document, groups equal
 * schemas and ranks the groups
 */

import type { TypeNode } from "../../types/type-node.js";
import {
  BatchOptions,
  DEFAULT_BATCH_OPTIONS,
  createContext,
} from "../../types/options.js";
import { Result, ok, fail, toError } from "../../types/result.js";
import { ErrorCode } from "../../utils/errors.js";
import { ROOT_PATH } from "../../utils/value-path.js";
import { logger } from "../../utils/logger.js";
import { tryDeriveType, type DocumentInput } from "../inferencer/index.js";
import { unify } from "../inferencer/unifier.js";
import { renderSchema, renderTypeExpr } from "../renderer/index.js";
import {
  BatchReport,
  MatchGroup,
  SchemaMatch,
  LenientSchema,
  UnmatchedDocument,
} from "./types.js";

export * from "./types.js";

export type DocumentOutcome =
  | { index: number; ok: true; type: TypeNode; schemaText: string }
  | { index: number; ok: false; failure: UnmatchedDocument };

/**
 * Derive every document on its own. A failure only marks that document;
 * outcomes stay at their original index.
 */
export function deriveEach(
  documents: readonly DocumentInput[],
  options: BatchOptions,
): DocumentOutcome[] {
  return documents.map((document, index): DocumentOutcome => {
    const result = tryDeriveType(document, options);
    if (result.ok) {
      return { index, ok: true, type: result.value, schemaText: renderSchema(result.value) };
    }

    logger.debug("Document did not produce a schema", {
      index,
      code: result.error.code,
      path: result.error.path,
    });
    return {
      index,
      ok: false,
      failure: {
        index,
        code: result.error.code,
        message: result.error.message,
        path: result.error.path,
      },
    };
  });
}

/**
 * Group derived documents by rendered schema text, in first-occurrence order
 */
export function groupBySchema(outcomes: readonly DocumentOutcome[]): MatchGroup[] {
  const groups = new Map<string, MatchGroup>();

  for (const outcome of outcomes) {
    if (!outcome.ok) {
      continue;
    }
    const group = groups.get(outcome.schemaText);
    if (group) {
      group.indices.push(outcome.index);
    } else {
      groups.set(outcome.schemaText, {
        schemaText: outcome.schemaText,
        type: outcome.type,
        indices: [outcome.index],
      });
    }
  }

  return [...groups.values()];
}

/**
 * Merge groups whose schemas unify by numeric widening alone: same fields,
 * no unions, no boolean or string coercion.
 */
export function coalesceGroups(groups: readonly MatchGroup[], maxDepth: number): MatchGroup[] {
  const context = createContext({ mode: "strict", maxDepth }, false);
  const merged: MatchGroup[] = [];

  for (const group of groups) {
    const target = merged.find((candidate) => unify(candidate.type, group.type, context).ok);
    if (target === undefined) {
      merged.push({ ...group, indices: [...group.indices] });
      continue;
    }

    const unified = unify(target.type, group.type, context);
    if (unified.ok) {
      target.type = unified.value;
      target.schemaText = renderSchema(unified.value);
      target.indices = [...target.indices, ...group.indices].sort((a, b) => a - b);
    }
  }

  return merged;
}

function firstIndex(group: MatchGroup): number {
  return group.indices[0] ?? Number.MAX_SAFE_INTEGER;
}

/**
 * Rank by member count descending, then by earliest member ascending
 */
export function rankGroups(groups: readonly MatchGroup[]): MatchGroup[] {
  return [...groups].sort(
    (a, b) => b.indices.length - a.indices.length || firstIndex(a) - firstIndex(b),
  );
}

function toSchemaMatch(group: MatchGroup): SchemaMatch {
  return {
    schema: renderTypeExpr(group.type),
    messagesMatched: [...group.indices],
    numMessagesMatched: group.indices.length,
  };
}

/**
 * Derive schemas for a batch of documents.
 *
 * Strict mode returns up to `maxSchemas` ranked groups with the documents
 * each one matched; lenient mode returns only the top group's schema. Fails
 * with NO_SCHEMA_DERIVED once every document has been tried and none
 * produced a schema.
 */
export function tryDeriveSchemas(
  documents: readonly DocumentInput[],
  options: Partial<BatchOptions> = {},
): Result<BatchReport> {
  const opts: BatchOptions = { ...DEFAULT_BATCH_OPTIONS, ...options };

  const outcomes = deriveEach(documents, opts);
  const unmatched = outcomes.flatMap((outcome) => (outcome.ok ? [] : [outcome.failure]));

  let groups = groupBySchema(outcomes);
  if (opts.coalesceWidening) {
    groups = coalesceGroups(groups, opts.maxDepth);
  }
  const ranked = rankGroups(groups);

  logger.info("Batch derivation complete", {
    mode: opts.mode,
    documents: documents.length,
    derived: documents.length - unmatched.length,
    unmatched: unmatched.length,
    distinctSchemas: ranked.length,
  });

  const top = ranked[0];
  if (top === undefined) {
    return fail(
      ErrorCode.NO_SCHEMA_DERIVED,
      documents.length === 0
        ? "No documents were supplied"
        : `None of the ${documents.length} documents produced a schema`,
      ROOT_PATH,
    );
  }

  if (opts.mode === "lenient") {
    const schema: LenientSchema = { schema: renderTypeExpr(top.type) };
    return ok<BatchReport>({
      mode: "lenient",
      totalDocuments: documents.length,
      unmatched,
      schemas: [schema],
    });
  }

  return ok<BatchReport>({
    mode: "strict",
    totalDocuments: documents.length,
    unmatched,
    schemas: ranked.slice(0, opts.maxSchemas).map(toSchemaMatch),
  });
}

/**
 * Throwing variant of {@link tryDeriveSchemas}
 */
export function deriveSchemas(
  documents: readonly DocumentInput[],
  options: Partial<BatchOptions> = {},
): BatchReport {
  const result = tryDeriveSchemas(documents, options);
  if (!result.ok) {
    throw toError(result.error);
  }
  return result.value;
}
