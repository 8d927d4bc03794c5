/**
 * ghexpr built-ins: fromjson, tojson
 */
import {
  EvaluationResult,
  JsonParseError,
  UnsupportedTypeError,
  isExprValue,
  getExprType,
} from "@ghexpr/core";
import type { ExprValue, FunctionDef } from "@ghexpr/core";

function describeRaw(raw: unknown): string {
  if (raw === null) return "null";
  if (Array.isArray(raw)) return "array";
  return typeof raw;
}

/**
 * Narrow a decoded payload to an ExprValue, keeping the original object.
 */
export function toExprValue(raw: unknown, fn: string): ExprValue {
  if (!isExprValue(raw)) {
    throw new UnsupportedTypeError(fn, describeRaw(raw));
  }
  return raw;
}

// JSON.parse turns numbers past the float64 range into Infinity.
function rejectNonFinite(_key: string, value: unknown): unknown {
  if (typeof value === "number" && !Number.isFinite(value)) {
    throw new RangeError("number out of range for a float64");
  }
  return value;
}

/**
 * fromjson(text) -> value
 * Decodes the string form of its argument. Malformed input is an error, never null.
 */
export const fromJsonFn: FunctionDef = {
  name: "fromjson",
  arity: 1,
  description: "Decodes a JSON document into a value.",
  call(args) {
    const input = (args[0] ?? EvaluationResult.null()).coerceString();

    let raw: unknown;
    try {
      raw = JSON.parse(input, rejectNonFinite);
    } catch (e) {
      throw new JsonParseError(input, e);
    }

    const value = toExprValue(raw, "fromjson");
    return new EvaluationResult(value, getExprType(value));
  },
};

/**
 * tojson(value) -> str
 * Pretty-printed with two-space indentation.
 */
export const toJsonFn: FunctionDef = {
  name: "tojson",
  arity: 1,
  description: "Encodes a value as pretty-printed JSON.",
  call(args) {
    const input = args[0] ?? EvaluationResult.null();
    return EvaluationResult.string(JSON.stringify(input.value, null, 2));
  },
};
