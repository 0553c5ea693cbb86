/**
 * Inferencer module types
 */

import type { ParsedValue } from "../../types/parsed-value.js";
import type { TypeNode } from "../../types/type-node.js";
import type { TypeExpr } from "../renderer/types.js";

/** JSON document text, or a value already parsed by the normalizer */
export type DocumentInput = string | ParsedValue;

export interface DerivedSchema {
  type: TypeNode;
  schema: TypeExpr;
  /** Canonical compact schema text */
  text: string;
}
