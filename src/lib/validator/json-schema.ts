/**
 * TypeNode → JSON Schema, following the JSON encoding of derived schemas:
 * a union value is written as `{"<branch name>": value}`, except null.
 */

import { TypeNode, PrimitiveKind, branchName } from "../../types/type-node.js";
import { JsonSchema } from "./types.js";

const INT_MIN = -2147483648;
const INT_MAX = 2147483647;

function primitiveSchema(kind: PrimitiveKind): JsonSchema {
  switch (kind) {
    case "null":
      return { type: "null" };
    case "boolean":
      return { type: "boolean" };
    case "int":
      return { type: "integer", minimum: INT_MIN, maximum: INT_MAX };
    case "long":
      return { type: "integer" };
    case "double":
      return { type: "number" };
    case "string":
      return { type: "string" };
  }
}

function branchSchema(branch: TypeNode): JsonSchema {
  if (branch.kind === "primitive" && branch.type === "null") {
    return { type: "null" };
  }

  const name = branchName(branch) ?? "";
  return {
    type: "object",
    properties: Object.fromEntries([[name, toJsonSchema(branch)]]),
    required: [name],
    additionalProperties: false,
  };
}

export function toJsonSchema(node: TypeNode): JsonSchema {
  switch (node.kind) {
    case "primitive":
      return primitiveSchema(node.type);
    case "array":
      return { type: "array", items: toJsonSchema(node.items) };
    case "record": {
      const properties: Record<string, JsonSchema> = Object.fromEntries(
        node.fields.map((field) => [field.name, toJsonSchema(field.type)]),
      );
      return {
        title: node.name,
        type: "object",
        properties,
        required: node.fields.map((field) => field.name),
        additionalProperties: false,
      };
    }
    case "union":
      return { anyOf: node.branches.map(branchSchema) };
  }
}
