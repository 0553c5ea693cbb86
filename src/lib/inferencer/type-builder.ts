/**
 * Type builder - ParsedValue → TypeNode with synthetic record names
 */

import {
  ParsedValue,
  ParsedMapping,
  ParsedSequence,
  isScalar,
} from "../../types/parsed-value.js";
import { TypeNode, RecordField, primitive, recordOf } from "../../types/type-node.js";
import type { DerivationContext } from "../../types/options.js";
import { Result, ok, fail } from "../../types/result.js";
import { ErrorCode } from "../../utils/errors.js";
import { ROOT_PATH, fieldPath, itemPath } from "../../utils/value-path.js";
import { classifyValue } from "./classifier.js";
import { resolveSequence } from "./sequence-resolver.js";

function buildRecord(
  value: ParsedMapping,
  name: string,
  context: DerivationContext,
  path: string,
  depth: number,
): Result<TypeNode> {
  if (name === "") {
    return fail(ErrorCode.INVALID_NAME, "Record name must not be empty", path);
  }

  const fields: RecordField[] = [];
  for (const [key, child] of value.entries) {
    const childPath = fieldPath(path, key);
    if (key === "") {
      return fail(ErrorCode.INVALID_NAME, "Field name must not be empty", childPath, key);
    }
    // A nested record is named after the field holding it
    const type = buildType(child, key, context, childPath, depth + 1);
    if (!type.ok) {
      return type;
    }
    fields.push({ name: key, type: type.value });
  }

  return ok(recordOf(name, fields));
}

function buildArray(
  value: ParsedSequence,
  name: string,
  context: DerivationContext,
  path: string,
  depth: number,
): Result<TypeNode> {
  const elementPath = itemPath(path);
  const items: TypeNode[] = [];
  for (const item of value.items) {
    // Record elements share the array's field name
    const type = buildType(item, name, context, elementPath, depth + 1);
    if (!type.ok) {
      return type;
    }
    items.push(type.value);
  }

  const resolved = resolveSequence(items, context, elementPath);
  if (!resolved.ok) {
    return resolved;
  }
  return ok<TypeNode>({ kind: "array", items: resolved.value });
}

/**
 * Build the type of one value. Depth counts nested arrays and records and
 * is capped by `context.maxDepth`.
 */
export function buildType(
  value: ParsedValue,
  name: string,
  context: DerivationContext,
  path: string = ROOT_PATH,
  depth = 0,
): Result<TypeNode> {
  if (isScalar(value)) {
    const kind = classifyValue(value, context.mode, path);
    return kind.ok ? ok(primitive(kind.value)) : kind;
  }

  if (depth >= context.maxDepth) {
    return fail(
      ErrorCode.DEPTH_LIMIT_EXCEEDED,
      `Nesting deeper than ${context.maxDepth} levels`,
      path,
    );
  }
  return value.kind === "mapping"
    ? buildRecord(value, name, context, path, depth)
    : buildArray(value, name, context, path, depth);
}
