/**
 * Validator module - checks sample documents against a derived schema
 */

export * from "./types.js";
export { SchemaValidator, summarize } from "./schema-validator.js";
export { toJsonSchema } from "./json-schema.js";

import type { TypeNode } from "../../types/type-node.js";
import { logger } from "../../utils/logger.js";
import { SchemaValidator, summarize } from "./schema-validator.js";
import { ConformanceReport, SchemaViolation } from "./types.js";

/**
 * Validate document texts against a schema. Texts that are not JSON count
 * as violations at their own index.
 */
export function validateDocuments(
  texts: readonly string[],
  schema: TypeNode,
): ConformanceReport {
  const validator = new SchemaValidator();
  validator.compile(schema);

  const violations: SchemaViolation[] = [];

  texts.forEach((text, index) => {
    let document: unknown;
    try {
      document = JSON.parse(text);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      violations.push({ documentIndex: index, errors: [{ path: "", message: reason }] });
      return;
    }

    if (!validator.validate(document)) {
      violations.push({ documentIndex: index, errors: validator.getErrors() });
    }
  });

  const report = summarize(texts.length, violations);
  logger.info("Conformance check complete", {
    documents: report.totalDocuments,
    valid: report.validDocuments,
    invalid: report.invalidDocuments,
  });
  return report;
}
