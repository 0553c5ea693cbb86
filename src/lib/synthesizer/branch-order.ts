/**
 * Render order of union branches
 */

import {
  TypeNode,
  PrimitiveKind,
  branchName,
  compareNames,
} from "../../types/type-node.js";

/** Lexical keyword order of primitive branches */
export const PRIMITIVE_BRANCH_ORDER: readonly PrimitiveKind[] = [
  "boolean",
  "double",
  "int",
  "long",
  "null",
  "string",
];

/**
 * Key identifying a branch within one union. Primitives are keyed by kind;
 * arrays and records share the name space of named branches.
 */
export function branchKey(node: TypeNode): string {
  return node.kind === "primitive" ? `primitive:${node.type}` : `named:${branchName(node) ?? ""}`;
}

export function compareBranches(a: TypeNode, b: TypeNode): number {
  if (a.kind === "primitive" && b.kind === "primitive") {
    return PRIMITIVE_BRANCH_ORDER.indexOf(a.type) - PRIMITIVE_BRANCH_ORDER.indexOf(b.type);
  }
  if (a.kind === "primitive") {
    return -1;
  }
  if (b.kind === "primitive") {
    return 1;
  }
  return compareNames(branchName(a) ?? "", branchName(b) ?? "");
}

export function orderBranches(branches: readonly TypeNode[]): TypeNode[] {
  return [...branches].sort(compareBranches);
}
