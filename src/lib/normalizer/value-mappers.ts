/**
 * Parsed JSON (lossless-json output or plain JS values) → ParsedValue mappers
 */

import { LosslessNumber } from "lossless-json";
import {
  ParsedValue,
  isIntegralLiteral,
  parsedNull,
} from "../../types/parsed-value.js";
import { Result, ok, fail, collect } from "../../types/result.js";
import { ErrorCode } from "../../utils/errors.js";
import { ROOT_PATH, fieldPath, itemPath } from "../../utils/value-path.js";

/**
 * Literal for a plain JS number. Exponent notation (`1e+21`) and fractions
 * are non-integral; everything else Number.isInteger accepts is integral.
 */
function numberLiteral(value: number): string {
  return Number.isFinite(value) ? String(value) : "";
}

function mapNumber(literal: string, path: string): Result<ParsedValue> {
  if (literal === "") {
    return fail(ErrorCode.INPUT_READ_ERROR, "Non-finite number is not valid JSON", path);
  }
  return ok<ParsedValue>({ kind: "number", literal, integral: isIntegralLiteral(literal) });
}

function isPlainObject(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function depthExceeded(maxDepth: number, path: string): Result<never> {
  return fail(
    ErrorCode.DEPTH_LIMIT_EXCEEDED,
    `Nesting deeper than ${maxDepth} levels`,
    path,
  );
}

/**
 * Map one JSON value, descending at most `maxDepth` levels of nesting
 */
export function mapValue(
  value: unknown,
  maxDepth: number,
  path = ROOT_PATH,
  depth = 0,
): Result<ParsedValue> {
  if (value === null) {
    return ok(parsedNull);
  }

  switch (typeof value) {
    case "boolean":
      return ok<ParsedValue>({ kind: "boolean", value });
    case "string":
      return ok<ParsedValue>({ kind: "string", value });
    case "number":
      return mapNumber(numberLiteral(value), path);
    case "bigint":
      return mapNumber(value.toString(), path);
    case "object":
      break;
    default:
      return fail(
        ErrorCode.INPUT_READ_ERROR,
        `Unsupported value of type ${typeof value}`,
        path,
      );
  }

  if (Array.isArray(value)) {
    if (depth >= maxDepth) {
      return depthExceeded(maxDepth, path);
    }
    const items = collect(
      value.map((item: unknown) => mapValue(item, maxDepth, itemPath(path), depth + 1)),
    );
    return items.ok ? ok<ParsedValue>({ kind: "sequence", items: items.value }) : items;
  }

  if (isPlainObject(value)) {
    if (depth >= maxDepth) {
      return depthExceeded(maxDepth, path);
    }
    const entries: Array<[string, ParsedValue]> = [];
    for (const [key, child] of Object.entries(value)) {
      const mapped = mapValue(child, maxDepth, fieldPath(path, key), depth + 1);
      if (!mapped.ok) {
        return mapped;
      }
      entries.push([key, mapped.value]);
    }
    return ok<ParsedValue>({ kind: "mapping", entries });
  }

  if (value instanceof LosslessNumber) {
    return mapNumber(value.value, path);
  }

  return fail(ErrorCode.INPUT_READ_ERROR, "Unsupported object value", path);
}
