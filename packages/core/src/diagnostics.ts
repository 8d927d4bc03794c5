/**
 * Diagnostics reported against an expression's source location.
 */
import { ExprError } from "./errors.js";

export interface Span {
  file: string;
  startLine: number;
  startCol: number;
  endLine: number;
  endCol: number;
}

export interface Diagnostic {
  code: string;
  message: string;
  span?: Span;
  hint?: string;
}

const HINTS: Record<string, string> = {
  E_UNKNOWN_FN: "Run 'ghexpr list' to see the available functions.",
  E_ARITY: "Check the number of arguments passed to the function.",
  E_JSON_PARSE: "fromjson() requires a valid JSON document.",
};

export function makeDiag(
  code: string,
  message: string,
  span?: Span,
  hint?: string
): Diagnostic {
  return { code, message, span, hint };
}

/**
 * Convert anything thrown during a call into a Diagnostic.
 */
export function diagnosticFromError(e: unknown): Diagnostic {
  if (e instanceof ExprError) {
    return makeDiag(e.code, e.message, e.span, HINTS[e.code]);
  }
  const msg = e instanceof Error ? e.message : String(e);
  return makeDiag("E_RUNTIME", msg);
}

export function formatDiagnostic(d: Diagnostic, pretty: boolean): string {
  if (!pretty) {
    return JSON.stringify(d);
  }
  const loc = d.span
    ? `${d.span.file}:${d.span.startLine}:${d.span.startCol}`
    : "<unknown>";
  let out = `error[${d.code}]: ${d.message}\n  --> ${loc}`;
  if (d.hint) {
    out += `\n  hint: ${d.hint}`;
  }
  return out;
}
