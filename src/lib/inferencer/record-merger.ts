/**
 * Structural merger for record types
 */

import {
  RecordNode,
  RecordField,
  TypeNode,
  compareNames,
  recordOf,
} from "../../types/type-node.js";
import type { DerivationContext } from "../../types/options.js";
import { Result, ok, fail } from "../../types/result.js";
import { ErrorCode } from "../../utils/errors.js";
import { fieldPath } from "../../utils/value-path.js";
import { unify } from "./unifier.js";
import { resolveSequence } from "./sequence-resolver.js";

/** Lowest name by code point, so merging is independent of argument order */
function mergedName(records: readonly RecordNode[]): string {
  return records
    .map((record) => record.name)
    .reduce((lowest, name) => (compareNames(name, lowest) < 0 ? name : lowest));
}

function fieldNames(record: RecordNode): string[] {
  return record.fields.map((field) => field.name);
}

function sameFieldNames(a: RecordNode, b: RecordNode): boolean {
  return (
    a.fields.length === b.fields.length &&
    a.fields.every((field, i) => b.fields[i]?.name === field.name)
  );
}

/**
 * Strict merge: both records must carry exactly the same fields, and each
 * field pair must unify. Any other shape difference is a merge failure the
 * unifier may hand to the union synthesizer.
 */
function mergeStrict(
  a: RecordNode,
  b: RecordNode,
  context: DerivationContext,
  path: string,
): Result<RecordNode> {
  if (!sameFieldNames(a, b)) {
    return fail(
      ErrorCode.INVALID_STRUCTURE,
      `Record shapes differ: [${fieldNames(a).join(", ")}] vs [${fieldNames(b).join(", ")}]`,
      path,
    );
  }

  const fields: RecordField[] = [];
  for (const [i, field] of a.fields.entries()) {
    const other = b.fields[i];
    if (other === undefined) {
      break;
    }
    const unified = unify(field.type, other.type, context, fieldPath(path, field.name));
    if (!unified.ok) {
      return unified.error.field === undefined
        ? fail(unified.error.code, unified.error.message, unified.error.path, field.name)
        : unified;
    }
    fields.push({ name: field.name, type: unified.value });
  }

  return ok(recordOf(mergedName([a, b]), fields));
}

/**
 * Union of all fields; the occurrences of each field are resolved together
 * so a conflicting field takes its majority type.
 */
function mergeFieldsByMajority(
  records: readonly RecordNode[],
  context: DerivationContext,
  path: string,
): Result<RecordNode> {
  const occurrences = new Map<string, TypeNode[]>();
  for (const record of records) {
    for (const field of record.fields) {
      const seen = occurrences.get(field.name);
      if (seen) {
        seen.push(field.type);
      } else {
        occurrences.set(field.name, [field.type]);
      }
    }
  }

  const fields: RecordField[] = [];
  for (const [name, types] of occurrences) {
    const resolved = resolveSequence(types, context, fieldPath(path, name));
    if (!resolved.ok) {
      return resolved;
    }
    fields.push({ name, type: resolved.value });
  }

  return ok(recordOf(mergedName(records), fields));
}

/**
 * Records carrying the most frequent field set; ties go to the set seen first
 */
function majorityShape(records: readonly RecordNode[]): RecordNode[] {
  const shapes = new Map<string, RecordNode[]>();
  for (const record of records) {
    const key = JSON.stringify(fieldNames(record));
    const members = shapes.get(key);
    if (members) {
      members.push(record);
    } else {
      shapes.set(key, [record]);
    }
  }

  let winner: RecordNode[] = [];
  for (const members of shapes.values()) {
    if (members.length > winner.length) {
      winner = members;
    }
  }
  return winner;
}

/**
 * Lenient merge of the records of one sequence: the most frequent field set
 * wins, and each of its fields takes the majority type of its occurrences.
 */
export function mergeRecordList(
  records: readonly RecordNode[],
  context: DerivationContext,
  path: string,
): Result<RecordNode> {
  if (records.length === 0) {
    return fail(ErrorCode.GENERAL_ERROR, "No records to merge", path);
  }
  return mergeFieldsByMajority(majorityShape(records), context, path);
}

/**
 * Lenient merge of two records: every field of either side is kept, and a
 * field on both sides is unified, falling back to the first side's type
 * when the two cannot be unified.
 */
function mergeLenient(
  a: RecordNode,
  b: RecordNode,
  context: DerivationContext,
  path: string,
): Result<RecordNode> {
  const fields: RecordField[] = [];
  for (const field of a.fields) {
    const other = b.fields.find((candidate) => candidate.name === field.name);
    if (other === undefined) {
      fields.push(field);
      continue;
    }
    const unified = unify(field.type, other.type, context, fieldPath(path, field.name));
    if (unified.ok) {
      fields.push({ name: field.name, type: unified.value });
      continue;
    }
    const resolved = resolveSequence(
      [field.type, other.type],
      context,
      fieldPath(path, field.name),
    );
    if (!resolved.ok) {
      return resolved;
    }
    fields.push({ name: field.name, type: resolved.value });
  }
  for (const field of b.fields) {
    if (!a.fields.some((candidate) => candidate.name === field.name)) {
      fields.push(field);
    }
  }

  return ok(recordOf(mergedName([a, b]), fields));
}

export function mergeRecords(
  a: RecordNode,
  b: RecordNode,
  context: DerivationContext,
  path: string,
): Result<RecordNode> {
  return context.mode === "strict"
    ? mergeStrict(a, b, context, path)
    : mergeLenient(a, b, context, path);
}
