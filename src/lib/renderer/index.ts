/**
 * Schema renderer - canonical schema text from a type tree
 */

import { TypeNode, sortFields } from "../../types/type-node.js";
import { TypeExpr } from "./types.js";

export * from "./types.js";
export * from "./schema-reader.js";

/**
 * Render a type node as a schema expression. Record fields are emitted in
 * ascending code-point order whatever order the node holds them in.
 */
export function renderTypeExpr(node: TypeNode): TypeExpr {
  switch (node.kind) {
    case "primitive":
      return node.type;
    case "array":
      return node.name === undefined
        ? { type: "array", items: renderTypeExpr(node.items) }
        : { name: node.name, type: "array", items: renderTypeExpr(node.items) };
    case "record":
      return {
        type: "record",
        name: node.name,
        fields: sortFields(node.fields).map((field) => ({
          name: field.name,
          type: renderTypeExpr(field.type),
        })),
      };
    case "union":
      return node.branches.map(renderTypeExpr);
  }
}

/**
 * Canonical compact schema text; identical trees always render identically
 */
export function renderSchema(node: TypeNode): string {
  return JSON.stringify(renderTypeExpr(node));
}

export function formatSchema(node: TypeNode, pretty = false): string {
  return pretty ? JSON.stringify(renderTypeExpr(node), null, 2) : renderSchema(node);
}
