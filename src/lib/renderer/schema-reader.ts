/**
 * Schema reader - rendered schema text back into a type tree
 */

import {
  TypeNode,
  RecordField,
  arrayOf,
  isPrimitiveKind,
  primitive,
  recordOf,
  unionOf,
} from "../../types/type-node.js";
import { Result, ok, fail, collect } from "../../types/result.js";
import { ErrorCode } from "../../utils/errors.js";
import { ROOT_PATH, fieldPath, itemPath } from "../../utils/value-path.js";

function invalid(message: string, path: string): Result<never> {
  return fail(ErrorCode.VALIDATION_ERROR, message, path);
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readFields(value: unknown, path: string): Result<RecordField[]> {
  if (!Array.isArray(value)) {
    return invalid("Record fields must be an array", path);
  }

  const fields: RecordField[] = [];
  const seen = new Set<string>();
  for (const [i, entry] of value.entries()) {
    const at = `${path}[${i}]`;
    if (!isObject(entry) || typeof entry.name !== "string" || entry.name === "") {
      return invalid("Field must be an object with a non-empty name", at);
    }
    if (seen.has(entry.name)) {
      return invalid(`Duplicate field "${entry.name}"`, at);
    }
    seen.add(entry.name);

    const type = readTypeExpr(entry.type, fieldPath(path, entry.name));
    if (!type.ok) {
      return type;
    }
    fields.push({ name: entry.name, type: type.value });
  }
  return ok(fields);
}

/**
 * Read one schema expression (already parsed from JSON)
 */
export function readTypeExpr(value: unknown, path: string = ROOT_PATH): Result<TypeNode> {
  if (typeof value === "string") {
    return isPrimitiveKind(value) ? ok(primitive(value)) : invalid(`Unknown type "${value}"`, path);
  }

  if (Array.isArray(value)) {
    if (value.some((branch) => Array.isArray(branch))) {
      return invalid("Unions may not contain unions", path);
    }
    const branches = collect(value.map((branch: unknown) => readTypeExpr(branch, itemPath(path))));
    return branches.ok ? ok<TypeNode>(unionOf(branches.value)) : branches;
  }

  if (!isObject(value)) {
    return invalid("Schema must be a type name, an object or a union array", path);
  }

  if (value.type === "array") {
    const items = readTypeExpr(value.items, itemPath(path));
    if (!items.ok) {
      return items;
    }
    const name = typeof value.name === "string" ? value.name : undefined;
    return ok<TypeNode>(arrayOf(items.value, name));
  }

  if (value.type === "record") {
    if (typeof value.name !== "string" || value.name === "") {
      return invalid("Record must have a non-empty name", path);
    }
    const fields = readFields(value.fields, path);
    return fields.ok ? ok<TypeNode>(recordOf(value.name, fields.value)) : fields;
  }

  return invalid(`Unsupported schema type ${JSON.stringify(value.type)}`, path);
}

/**
 * Read rendered schema text
 */
export function readSchema(text: string): Result<TypeNode> {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return invalid(`Schema is not valid JSON: ${reason}`, ROOT_PATH);
  }
  return readTypeExpr(value);
}
