/**
 * ghexpr value model: tagged runtime values and their coercions.
 */
import { z } from "zod";

export type ExprType = "null" | "bool" | "number" | "string" | "array" | "object";

export type ExprValue =
  | null
  | boolean
  | number
  | string
  | ExprValue[]
  | ExprObject;

export type ExprObject = { [key: string]: ExprValue };

export const exprValueSchema: z.ZodType<ExprValue> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number().finite(),
    z.string(),
    z.array(exprValueSchema),
    z.record(exprValueSchema),
  ])
);

/**
 * Checks `raw` without rebuilding it, so keys such as "__proto__" survive.
 */
export function isExprValue(raw: unknown): raw is ExprValue {
  return exprValueSchema.safeParse(raw).success;
}

function assertNever(x: never): never {
  throw new Error(`Unhandled value type: ${String(x)}`);
}

/**
 * Classify a decoded payload.
 */
export function getExprType(raw: ExprValue): ExprType {
  if (raw === null) return "null";
  if (Array.isArray(raw)) return "array";
  switch (typeof raw) {
    case "boolean":
      return "bool";
    case "number":
      return "number";
    case "string":
      return "string";
    default:
      return "object";
  }
}

const DECIMAL_RE = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;
const HEX_RE = /^([+-]?)0x([0-9a-f]+)$/i;

function parseNumber(s: string): number {
  const trimmed = s.trim();
  if (trimmed === "") return 0;
  if (DECIMAL_RE.test(trimmed)) return Number(trimmed);
  const hex = HEX_RE.exec(trimmed);
  if (hex) {
    const n = parseInt(hex[2] ?? "", 16);
    return hex[1] === "-" ? -n : n;
  }
  return NaN;
}

/**
 * A runtime value paired with its type tag.
 *
 * The tag is normally derived from the payload, but boolean results produced by
 * built-ins are always tagged "bool".
 */
export class EvaluationResult {
  readonly value: ExprValue;
  readonly type: ExprType;

  constructor(value: ExprValue, type: ExprType) {
    this.value = value;
    this.type = type;
  }

  static of(value: ExprValue): EvaluationResult {
    return new EvaluationResult(value, getExprType(value));
  }

  static bool(b: boolean): EvaluationResult {
    return new EvaluationResult(b, "bool");
  }

  static string(s: string): EvaluationResult {
    return new EvaluationResult(s, "string");
  }

  static null(): EvaluationResult {
    return new EvaluationResult(null, "null");
  }

  /** Null, bool, number and string are primitive; arrays and objects are not. */
  primitive(): boolean {
    return this.type !== "array" && this.type !== "object";
  }

  coerceString(): string {
    switch (this.type) {
      case "null":
        return "";
      case "bool":
        return this.value === true ? "true" : "false";
      case "number":
        return typeof this.value === "number" ? String(this.value) : EvaluationResult.of(this.value).coerceString();
      case "string":
        return typeof this.value === "string" ? this.value : EvaluationResult.of(this.value).coerceString();
      case "array":
        return "Array";
      case "object":
        return "Object";
      default:
        return assertNever(this.type);
    }
  }

  coerceNumber(): number {
    switch (this.type) {
      case "null":
        return 0;
      case "bool":
        return this.value === true ? 1 : 0;
      case "number":
        return typeof this.value === "number" ? this.value : NaN;
      case "string":
        return typeof this.value === "string" ? parseNumber(this.value) : NaN;
      case "array":
      case "object":
        return NaN;
      default:
        return assertNever(this.type);
    }
  }

  /**
   * Element values of an array, or undefined when this value is not array-shaped.
   */
  coerceSlice(): EvaluationResult[] | undefined {
    if (this.type !== "array" || !Array.isArray(this.value)) return undefined;
    return this.value.map((el) => EvaluationResult.of(el));
  }

  equals(other: EvaluationResult): boolean {
    if (!this.primitive() || !other.primitive()) {
      return this.type === other.type && this.value === other.value;
    }

    if (this.type === other.type) {
      switch (this.type) {
        case "null":
          return true;
        case "string":
          return this.coerceString().toLowerCase() === other.coerceString().toLowerCase();
        case "bool":
          return this.value === other.value;
        case "number":
          // NaN !== NaN
          return this.coerceNumber() === other.coerceNumber();
        default:
          return false;
      }
    }

    return this.coerceNumber() === other.coerceNumber();
  }
}
