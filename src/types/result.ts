/**
 * Explicit success/failure values used throughout the engine.
 *
 * The aggregator inspects failures to mark a document unmatched; only the
 * public single-document entry points turn a failure into a thrown error.
 */

import {
  ErrorCode,
  SchemaDeriveError,
  InvalidNameError,
  IntegerRangeError,
  TypeConflictError,
  InvalidStructureError,
  DepthLimitError,
  NoSchemaDerivedError,
  InputReadError,
  ValidationError,
} from "../utils/errors.js";

export interface DerivationFailure {
  code: ErrorCode;
  message: string;
  /** Location in the source value, e.g. `$.orders[].id` */
  path: string;
  /** Offending field, when the failure is about one */
  field?: string;
}

export type Result<T, E = DerivationFailure> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function fail(
  code: ErrorCode,
  message: string,
  path: string,
  field?: string,
): Result<never> {
  return {
    ok: false,
    error: field === undefined ? { code, message, path } : { code, message, path, field },
  };
}

/**
 * Collect results in order, stopping at the first failure
 */
export function collect<T>(results: Iterable<Result<T>>): Result<T[]> {
  const values: T[] = [];
  for (const result of results) {
    if (!result.ok) {
      return result;
    }
    values.push(result.value);
  }
  return ok(values);
}

/**
 * Convert a failure into the matching error class
 */
export function toError(failure: DerivationFailure): SchemaDeriveError {
  const details: Record<string, unknown> = { path: failure.path };
  if (failure.field !== undefined) {
    details.field = failure.field;
  }

  switch (failure.code) {
    case ErrorCode.INVALID_NAME:
      return new InvalidNameError(failure.message, details);
    case ErrorCode.RANGE_ERROR:
      return new IntegerRangeError(failure.message, details);
    case ErrorCode.TYPE_CONFLICT:
      return new TypeConflictError(failure.message, details);
    case ErrorCode.INVALID_STRUCTURE:
      return new InvalidStructureError(failure.message, details);
    case ErrorCode.DEPTH_LIMIT_EXCEEDED:
      return new DepthLimitError(failure.message, details);
    case ErrorCode.NO_SCHEMA_DERIVED:
      return new NoSchemaDerivedError(failure.message, details);
    case ErrorCode.INPUT_READ_ERROR:
      return new InputReadError(failure.message, details);
    case ErrorCode.VALIDATION_ERROR:
      return new ValidationError(failure.message, details);
    default:
      return new SchemaDeriveError(failure.code, failure.message, details);
  }
}

/**
 * Unwrap a result or throw the matching error
 */
export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw toError(result.error);
  }
  return result.value;
}
