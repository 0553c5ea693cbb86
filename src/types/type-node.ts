/**
 * Internal type tree built per derivation call and discarded once rendered.
 */

export type PrimitiveKind = "null" | "boolean" | "int" | "long" | "double" | "string";

export const PRIMITIVE_KINDS: readonly PrimitiveKind[] = [
  "null",
  "boolean",
  "int",
  "long",
  "double",
  "string",
];

export type NumericKind = "int" | "long" | "double";

/** Widening ladder; a kind is replaced only by one with a higher rank */
export const NUMERIC_RANK: Record<NumericKind, number> = {
  int: 0,
  long: 1,
  double: 2,
};

export interface PrimitiveNode {
  kind: "primitive";
  type: PrimitiveKind;
}

export interface ArrayNode {
  kind: "array";
  items: TypeNode;
  /** Set only when the array is a union branch */
  name?: string;
}

export interface RecordField {
  name: string;
  type: TypeNode;
}

export interface RecordNode {
  kind: "record";
  name: string;
  /** Unique by name, ascending by code point */
  fields: RecordField[];
}

export interface UnionNode {
  kind: "union";
  /** Flattened, unique by primitive kind or by name, in render order */
  branches: TypeNode[];
}

export type TypeNode = PrimitiveNode | ArrayNode | RecordNode | UnionNode;

/** Branch name given to arrays that appear inside a union */
export const ARRAY_BRANCH_NAME = "array";

export function isPrimitiveKind(value: string): value is PrimitiveKind {
  return (PRIMITIVE_KINDS as readonly string[]).includes(value);
}

export function isNumericKind(kind: PrimitiveKind): kind is NumericKind {
  return kind === "int" || kind === "long" || kind === "double";
}

export function primitive(type: PrimitiveKind): PrimitiveNode {
  return { kind: "primitive", type };
}

export function arrayOf(items: TypeNode, name?: string): ArrayNode {
  return name === undefined ? { kind: "array", items } : { kind: "array", items, name };
}

export function recordOf(name: string, fields: RecordField[]): RecordNode {
  return { kind: "record", name, fields: sortFields(fields) };
}

export function unionOf(branches: TypeNode[]): UnionNode {
  return { kind: "union", branches };
}

/**
 * Ordinal comparison by Unicode code point, which matches UTF-8 byte order.
 * Plain `<` on strings compares UTF-16 code units and disagrees for astral
 * characters.
 */
export function compareNames(a: string, b: string): number {
  const left = Array.from(a);
  const right = Array.from(b);
  const length = Math.min(left.length, right.length);

  for (let i = 0; i < length; i++) {
    const diff = (left[i]?.codePointAt(0) ?? 0) - (right[i]?.codePointAt(0) ?? 0);
    if (diff !== 0) {
      return diff;
    }
  }

  return left.length - right.length;
}

export function sortFields(fields: RecordField[]): RecordField[] {
  return [...fields].sort((a, b) => compareNames(a.name, b.name));
}

/**
 * Name used to identify a node as a union branch: the keyword for
 * primitives, the branch name for arrays and the record name for records.
 */
export function branchName(node: TypeNode): string | undefined {
  switch (node.kind) {
    case "primitive":
      return node.type;
    case "array":
      return node.name ?? ARRAY_BRANCH_NAME;
    case "record":
      return node.name;
    case "union":
      return undefined;
  }
}

export function describeType(node: TypeNode): string {
  switch (node.kind) {
    case "primitive":
      return node.type;
    case "array":
      return `array<${describeType(node.items)}>`;
    case "record":
      return `record ${node.name}`;
    case "union":
      return `union [${node.branches.map(describeType).join(", ")}]`;
  }
}

/** Deep structural equality */
export function typesEqual(a: TypeNode, b: TypeNode): boolean {
  if (a.kind === "primitive" && b.kind === "primitive") {
    return a.type === b.type;
  }
  if (a.kind === "array" && b.kind === "array") {
    return a.name === b.name && typesEqual(a.items, b.items);
  }
  if (a.kind === "record" && b.kind === "record") {
    return (
      a.name === b.name &&
      a.fields.length === b.fields.length &&
      a.fields.every((field, i) => {
        const other = b.fields[i];
        return other !== undefined && other.name === field.name && typesEqual(field.type, other.type);
      })
    );
  }
  if (a.kind === "union" && b.kind === "union") {
    return (
      a.branches.length === b.branches.length &&
      a.branches.every((branch, i) => {
        const other = b.branches[i];
        return other !== undefined && typesEqual(branch, other);
      })
    );
  }
  return false;
}
