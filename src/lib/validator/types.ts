/**
 * Validator module types
 */

export interface ViolationDetail {
  /** JSON pointer into the document, or the schema path when none applies */
  path: string;
  message: string;
}

export interface SchemaViolation {
  documentIndex: number;
  errors: ViolationDetail[];
}

export interface ConformanceReport {
  totalDocuments: number;
  validDocuments: number;
  invalidDocuments: number;
  conformanceRate: number;
  violations: SchemaViolation[];
}

/** JSON Schema subset produced from a derived type */
export type JsonSchema = {
  type?: "null" | "boolean" | "integer" | "number" | "string" | "array" | "object";
  minimum?: number;
  maximum?: number;
  items?: JsonSchema;
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: boolean;
  anyOf?: JsonSchema[];
  title?: string;
};
