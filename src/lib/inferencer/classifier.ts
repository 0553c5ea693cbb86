/**
 * Value classifier - maps one scalar JSON value to a primitive kind
 */

import { ParsedScalar, isIntegralLiteral } from "../../types/parsed-value.js";
import type { PrimitiveKind } from "../../types/type-node.js";
import type { DerivationMode } from "../../types/options.js";
import { Result, ok, fail } from "../../types/result.js";
import { ErrorCode } from "../../utils/errors.js";
import { ROOT_PATH } from "../../utils/value-path.js";

const INT32_MIN = -(2n ** 31n);
const INT32_MAX = 2n ** 31n - 1n;
const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

/**
 * Narrowest integer kind holding `literal`, or undefined past 64 bits
 */
export function integerKind(literal: string): "int" | "long" | undefined {
  const value = BigInt(literal);
  if (value >= INT32_MIN && value <= INT32_MAX) {
    return "int";
  }
  if (value >= INT64_MIN && value <= INT64_MAX) {
    return "long";
  }
  return undefined;
}

/**
 * Classify a scalar value.
 *
 * Integers beyond the signed 64-bit range fail in strict mode and fall back
 * to `double` in lenient mode, accepting the precision loss.
 */
export function classifyValue(
  value: ParsedScalar,
  mode: DerivationMode,
  path: string = ROOT_PATH,
): Result<PrimitiveKind> {
  switch (value.kind) {
    case "null":
      return ok<PrimitiveKind>("null");
    case "boolean":
      return ok<PrimitiveKind>("boolean");
    case "string":
      return ok<PrimitiveKind>("string");
    case "number": {
      if (!value.integral) {
        return ok<PrimitiveKind>("double");
      }
      if (!isIntegralLiteral(value.literal)) {
        return fail(
          ErrorCode.INPUT_READ_ERROR,
          `Number literal "${value.literal}" is marked integral but is not an integer`,
          path,
        );
      }
      const kind = integerKind(value.literal);
      if (kind !== undefined) {
        return ok<PrimitiveKind>(kind);
      }
      if (mode === "lenient") {
        return ok<PrimitiveKind>("double");
      }
      return fail(
        ErrorCode.RANGE_ERROR,
        `Integer ${value.literal} does not fit in a signed 64-bit long`,
        path,
      );
    }
  }
}
