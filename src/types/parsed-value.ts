/**
 * Parsed JSON value tree consumed by the derivation engine.
 *
 * Numbers keep their source literal so integer magnitudes beyond the
 * float64 range, and the difference between `10` and `1e1`, survive parsing.
 */

export type ParsedValue =
  | ParsedNull
  | ParsedBoolean
  | ParsedNumber
  | ParsedString
  | ParsedSequence
  | ParsedMapping;

export interface ParsedNull {
  kind: "null";
}

export interface ParsedBoolean {
  kind: "boolean";
  value: boolean;
}

export interface ParsedNumber {
  kind: "number";
  /** Source literal, e.g. "-12", "1.5", "1e16" */
  literal: string;
  /** True when the literal has neither a fraction nor an exponent */
  integral: boolean;
}

export interface ParsedString {
  kind: "string";
  value: string;
}

export interface ParsedSequence {
  kind: "sequence";
  items: ParsedValue[];
}

export interface ParsedMapping {
  kind: "mapping";
  /** Entries in source order; keys are unique */
  entries: Array<[string, ParsedValue]>;
}

export type ParsedScalar = ParsedNull | ParsedBoolean | ParsedNumber | ParsedString;

const INTEGRAL_LITERAL = /^-?\d+$/;

export function isIntegralLiteral(literal: string): boolean {
  return INTEGRAL_LITERAL.test(literal);
}

export function isScalar(value: ParsedValue): value is ParsedScalar {
  return value.kind !== "sequence" && value.kind !== "mapping";
}

// Constructors, mostly for tests and programmatic callers

export const parsedNull: ParsedNull = { kind: "null" };

export function parsedBoolean(value: boolean): ParsedBoolean {
  return { kind: "boolean", value };
}

export function parsedNumber(literal: string | number): ParsedNumber {
  const text = String(literal);
  return { kind: "number", literal: text, integral: isIntegralLiteral(text) };
}

export function parsedString(value: string): ParsedString {
  return { kind: "string", value };
}

export function parsedSequence(items: ParsedValue[]): ParsedSequence {
  return { kind: "sequence", items };
}

export function parsedMapping(entries: Array<[string, ParsedValue]>): ParsedMapping {
  return { kind: "mapping", entries };
}
