/**
 * Rendered schema expressions
 */

import type { PrimitiveKind } from "../../types/type-node.js";

export interface FieldExpr {
  name: string;
  type: TypeExpr;
}

export interface RecordTypeExpr {
  type: "record";
  name: string;
  fields: FieldExpr[];
}

export interface ArrayTypeExpr {
  /** Present only on array union branches */
  name?: string;
  type: "array";
  items: TypeExpr;
}

/** A JSON array denotes a union */
export type TypeExpr = PrimitiveKind | RecordTypeExpr | ArrayTypeExpr | TypeExpr[];
