/**
 * Union synthesizer - strict-mode fallback that turns record shapes which
 * cannot be merged into a union, when every shape is a legitimate branch
 */

import {
  TypeNode,
  RecordNode,
  ARRAY_BRANCH_NAME,
  arrayOf,
  describeType,
  isPrimitiveKind,
  primitive,
  unionOf,
} from "../../types/type-node.js";
import type { DerivationContext } from "../../types/options.js";
import { Result, ok, fail } from "../../types/result.js";
import { ErrorCode } from "../../utils/errors.js";
import { fieldPath } from "../../utils/value-path.js";
import { unify } from "../inferencer/unifier.js";
import { branchKey, orderBranches } from "./branch-order.js";
import { DecodedBranch } from "./types.js";

export * from "./types.js";
export * from "./branch-order.js";

/**
 * Two record candidates that share a field name must agree on its type,
 * otherwise no union can tell them apart.
 */
function checkSharedFields(
  records: readonly RecordNode[],
  context: DerivationContext,
  path: string,
): Result<void> {
  for (let i = 0; i < records.length; i++) {
    for (let j = i + 1; j < records.length; j++) {
      const left = records[i];
      const right = records[j];
      if (left === undefined || right === undefined) {
        continue;
      }
      for (const field of left.fields) {
        const other = right.fields.find((candidate) => candidate.name === field.name);
        if (other === undefined) {
          continue;
        }
        const at = fieldPath(path, field.name);
        if (!unify(field.type, other.type, context, at).ok) {
          return fail(
            ErrorCode.INVALID_STRUCTURE,
            `Field "${field.name}" has incompatible types ${describeType(field.type)} and ${describeType(other.type)}`,
            at,
            field.name,
          );
        }
      }
    }
  }
  return ok(undefined);
}

/**
 * A record stands for a union branch when it has a single field named
 * after the branch type: `{"long": 12}`, `{"array": [1]}` or
 * `{"Address": {...}}` for a record named Address.
 */
function decodeRecordBranch(
  record: RecordNode,
  context: DerivationContext,
  path: string,
): Result<DecodedBranch> {
  const [field, ...rest] = record.fields;
  if (field === undefined || rest.length > 0) {
    return fail(
      ErrorCode.INVALID_STRUCTURE,
      `Record "${record.name}" with fields [${record.fields.map((f) => f.name).join(", ")}] cannot be a union branch`,
      path,
    );
  }

  const at = fieldPath(path, field.name);
  const value = field.type;

  if (value.kind === "primitive" && isPrimitiveKind(field.name)) {
    const target = primitive(field.name);
    const widened = unify(value, target, { ...context, allowUnions: false }, at);
    if (widened.ok && widened.value.kind === "primitive" && widened.value.type === target.type) {
      return ok({ branch: target, encodedBy: field.name });
    }
    return fail(
      ErrorCode.INVALID_STRUCTURE,
      `Field "${field.name}" holds ${describeType(value)}, which does not fit branch "${field.name}"`,
      at,
      field.name,
    );
  }

  if (value.kind === "array" && field.name === ARRAY_BRANCH_NAME) {
    return ok({ branch: arrayOf(value.items, ARRAY_BRANCH_NAME), encodedBy: field.name });
  }

  if (value.kind === "record" && value.name === field.name) {
    return ok({ branch: value, encodedBy: field.name });
  }

  return fail(
    ErrorCode.INVALID_STRUCTURE,
    `Field "${field.name}" does not name the type of its ${describeType(value)} value, so it cannot be a union branch`,
    at,
    field.name,
  );
}

function decodeCandidate(
  candidate: TypeNode,
  context: DerivationContext,
  path: string,
): Result<DecodedBranch[]> {
  switch (candidate.kind) {
    case "union":
      return ok(candidate.branches.map((branch) => ({ branch })));
    case "record": {
      const decoded = decodeRecordBranch(candidate, context, path);
      return decoded.ok ? ok([decoded.value]) : decoded;
    }
    case "array":
      return ok([{ branch: arrayOf(candidate.items, ARRAY_BRANCH_NAME) }]);
    case "primitive":
      return ok([{ branch: candidate }]);
  }
}

/**
 * Synthesize a union from candidates that could not be merged.
 *
 * Existing unions are flattened in; branches with the same kind or name are
 * unified, and the result is ordered primitives first, then by name. A
 * single surviving branch is returned on its own.
 */
export function synthesizeUnion(
  candidates: readonly TypeNode[],
  context: DerivationContext,
  path: string,
): Result<TypeNode> {
  if (context.mode !== "strict" || !context.allowUnions) {
    return fail(
      ErrorCode.TYPE_CONFLICT,
      `Cannot combine ${candidates.map(describeType).join(", ")} without a union`,
      path,
    );
  }

  const records = candidates.filter((candidate): candidate is RecordNode => candidate.kind === "record");
  const shared = checkSharedFields(records, context, path);
  if (!shared.ok) {
    return shared;
  }

  const branches = new Map<string, TypeNode>();
  const strictOnly: DerivationContext = { ...context, allowUnions: false };

  for (const candidate of candidates) {
    const decoded = decodeCandidate(candidate, context, path);
    if (!decoded.ok) {
      return decoded;
    }

    for (const { branch, encodedBy } of decoded.value) {
      const key = branchKey(branch);
      const existing = branches.get(key);
      if (existing === undefined) {
        branches.set(key, branch);
        continue;
      }
      const merged = unify(existing, branch, strictOnly, path);
      if (!merged.ok) {
        return fail(
          ErrorCode.INVALID_STRUCTURE,
          `Union branch ${describeType(existing)} cannot absorb ${describeType(branch)}`,
          path,
          encodedBy,
        );
      }
      branches.set(key, merged.value);
    }
  }

  const ordered = orderBranches([...branches.values()]);
  const [only, ...others] = ordered;
  if (only !== undefined && others.length === 0) {
    return ok(only);
  }
  return ok<TypeNode>(unionOf(ordered));
}
