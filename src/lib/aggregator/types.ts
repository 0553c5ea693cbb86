/**
 * Multi-message aggregator types
 */

import type { TypeNode } from "../../types/type-node.js";
import type { TypeExpr } from "../renderer/types.js";
import type { ErrorCode } from "../../utils/errors.js";

/** Documents whose derivation rendered the same schema text */
export interface MatchGroup {
  schemaText: string;
  type: TypeNode;
  /** Original document indices, ascending */
  indices: number[];
}

/** Strict-mode output entry */
export interface SchemaMatch {
  schema: TypeExpr;
  messagesMatched: number[];
  numMessagesMatched: number;
}

/** Lenient-mode output entry */
export interface LenientSchema {
  schema: TypeExpr;
}

export interface UnmatchedDocument {
  index: number;
  code: ErrorCode;
  message: string;
  path: string;
}

interface BatchReportBase {
  totalDocuments: number;
  unmatched: UnmatchedDocument[];
}

export interface StrictBatchReport extends BatchReportBase {
  mode: "strict";
  schemas: SchemaMatch[];
}

export interface LenientBatchReport extends BatchReportBase {
  mode: "lenient";
  schemas: [LenientSchema];
}

export type BatchReport = StrictBatchReport | LenientBatchReport;
