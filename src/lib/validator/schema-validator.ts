/**
 * Conformance checking of documents against a derived schema using Ajv
 */

import { Ajv, type ValidateFunction } from "ajv";
import type { TypeNode } from "../../types/type-node.js";
import { ValidationError } from "../../utils/errors.js";
import { toJsonSchema } from "./json-schema.js";
import { ConformanceReport, SchemaViolation, ViolationDetail } from "./types.js";

export class SchemaValidator {
  private ajv: Ajv;
  private validateFn: ValidateFunction | null = null;

  constructor() {
    this.ajv = new Ajv({
      strict: false,
      allErrors: true,
    });
  }

  /**
   * Compile a derived schema for validation
   */
  compile(schema: TypeNode): void {
    this.validateFn = this.ajv.compile(toJsonSchema(schema));
  }

  /**
   * Validate a single document against the compiled schema
   */
  validate(document: unknown): boolean {
    if (!this.validateFn) {
      throw new ValidationError("Schema not compiled. Call compile() first.");
    }

    return this.validateFn(document);
  }

  /**
   * Get validation errors for the last validation
   */
  getErrors(): ViolationDetail[] {
    if (!this.validateFn || !this.validateFn.errors) {
      return [];
    }

    return this.validateFn.errors.map((error) => {
      // For missing required properties, Ajv includes the field name in params
      const missing: unknown =
        error.keyword === "required" ? error.params.missingProperty : undefined;
      const path =
        typeof missing === "string"
          ? `${error.instancePath}/${missing}`
          : error.instancePath || error.schemaPath;

      return {
        path,
        message: `${error.message ?? "invalid"} (keyword: ${error.keyword})`,
      };
    });
  }

  /**
   * Validate all documents and collect violations
   */
  validateAll(documents: readonly unknown[]): ConformanceReport {
    const violations: SchemaViolation[] = [];

    documents.forEach((doc, index) => {
      if (!this.validate(doc)) {
        violations.push({ documentIndex: index, errors: this.getErrors() });
      }
    });

    return summarize(documents.length, violations);
  }
}

export function summarize(
  totalDocuments: number,
  violations: SchemaViolation[],
): ConformanceReport {
  const validDocuments = totalDocuments - violations.length;
  return {
    totalDocuments,
    validDocuments,
    invalidDocuments: violations.length,
    conformanceRate: totalDocuments > 0 ? validDocuments / totalDocuments : 0,
    violations,
  };
}
