/**
 * ghexpr error hierarchy. Every failure raised by dispatch or a built-in is an ExprError.
 */
import type { Span } from "./diagnostics.js";
import type { ExprObject } from "./values.js";

export class ExprError extends Error {
  code: string;
  span?: Span;
  details?: ExprObject;

  constructor(code: string, message: string, details?: ExprObject, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ExprError";
    this.code = code;
    this.details = details;
  }
}

export class UnknownFunctionError extends ExprError {
  constructor(fn: string) {
    super("E_UNKNOWN_FN", `Unknown function '${fn}'.`, { fn });
    this.name = "UnknownFunctionError";
  }
}

export class ArityError extends ExprError {
  constructor(fn: string, expected: string, actual: number) {
    super(
      "E_ARITY",
      `${fn}() expects ${expected} argument${expected === "1" ? "" : "s"}, got ${actual}.`,
      { fn, expected, actual }
    );
    this.name = "ArityError";
  }
}

/**
 * Raised from a function body.
 */
export class EvaluationError extends ExprError {
  constructor(code: string, message: string, details?: ExprObject, options?: { cause?: unknown }) {
    super(code, message, details, options);
    this.name = "EvaluationError";
  }
}

export class JsonParseError extends EvaluationError {
  readonly input: string;

  constructor(input: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("E_JSON_PARSE", `unable to unmarshal \`${input}\` fromjson: ${reason}`, { input }, { cause });
    this.name = "JsonParseError";
    this.input = input;
  }
}

export class UnsupportedTypeError extends EvaluationError {
  constructor(fn: string, received: string) {
    super("E_UNSUPPORTED_TYPE", `unknown type ${received} in ${fn}`, { fn, received });
    this.name = "UnsupportedTypeError";
  }
}
