/**
 * Type unifier - least upper bound of two type nodes
 */

import {
  TypeNode,
  PrimitiveKind,
  PrimitiveNode,
  NUMERIC_RANK,
  arrayOf,
  describeType,
  isNumericKind,
  primitive,
} from "../../types/type-node.js";
import type { DerivationContext } from "../../types/options.js";
import { Result, ok, fail } from "../../types/result.js";
import { ErrorCode } from "../../utils/errors.js";
import { ROOT_PATH, itemPath } from "../../utils/value-path.js";
import { mergeRecords } from "./record-merger.js";
import { synthesizeUnion } from "../synthesizer/index.js";

function conflict(a: TypeNode, b: TypeNode, path: string): Result<never> {
  return fail(
    ErrorCode.TYPE_CONFLICT,
    `Cannot unify ${describeType(a)} with ${describeType(b)}`,
    path,
  );
}

function isNull(node: TypeNode): boolean {
  return node.kind === "primitive" && node.type === "null";
}

/**
 * Primitive lattice: int < long < double; boolean joins the numeric ladder
 * only in lenient mode; string joins nothing.
 */
export function unifyPrimitives(
  a: PrimitiveKind,
  b: PrimitiveKind,
  context: DerivationContext,
): PrimitiveKind | undefined {
  if (a === b) {
    return a;
  }
  if (a === "null") {
    return b;
  }
  if (b === "null") {
    return a;
  }
  if (isNumericKind(a) && isNumericKind(b)) {
    return NUMERIC_RANK[a] >= NUMERIC_RANK[b] ? a : b;
  }
  if (context.mode === "lenient") {
    if (a === "boolean" && isNumericKind(b)) {
      return b;
    }
    if (b === "boolean" && isNumericKind(a)) {
      return a;
    }
  }
  return undefined;
}

function unifyPrimitiveNodes(
  a: PrimitiveNode,
  b: PrimitiveNode,
  context: DerivationContext,
  path: string,
): Result<TypeNode> {
  const kind = unifyPrimitives(a.type, b.type, context);
  return kind === undefined ? conflict(a, b, path) : ok(kind === a.type ? a : primitive(kind));
}

function canSynthesize(context: DerivationContext): boolean {
  return context.mode === "strict" && context.allowUnions;
}

/**
 * Unify two type nodes. Symmetric: the result does not depend on argument
 * order, except for lenient record fields whose conflicting occurrences tie.
 */
export function unify(
  a: TypeNode,
  b: TypeNode,
  context: DerivationContext,
  path: string = ROOT_PATH,
): Result<TypeNode> {
  if (isNull(a)) {
    return ok(b);
  }
  if (isNull(b)) {
    return ok(a);
  }

  if (a.kind === "union" || b.kind === "union") {
    return canSynthesize(context) ? synthesizeUnion([a, b], context, path) : conflict(a, b, path);
  }

  if (a.kind === "primitive" && b.kind === "primitive") {
    return unifyPrimitiveNodes(a, b, context, path);
  }

  if (a.kind === "array" && b.kind === "array") {
    const items = unify(a.items, b.items, context, itemPath(path));
    if (!items.ok) {
      return items;
    }
    return ok(arrayOf(items.value, a.name ?? b.name));
  }

  if (a.kind === "record" && b.kind === "record") {
    const merged = mergeRecords(a, b, context, path);
    if (merged.ok || !canSynthesize(context)) {
      return merged;
    }
    return synthesizeUnion([a, b], context, path);
  }

  // A record against a primitive or array is only legal as a union
  if ((a.kind === "record" || b.kind === "record") && canSynthesize(context)) {
    return synthesizeUnion([a, b], context, path);
  }

  return conflict(a, b, path);
}
