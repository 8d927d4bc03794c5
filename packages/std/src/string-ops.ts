/**
 * ghexpr built-ins: string operations
 * startswith, endswith, format
 */
import { EvaluationResult, EvaluationError } from "@ghexpr/core";
import type { FunctionDef } from "@ghexpr/core";

function affixTest(
  args: readonly EvaluationResult[],
  test: (s: string, affix: string) => boolean
): EvaluationResult {
  const left = args[0] ?? EvaluationResult.null();
  const right = args[1] ?? EvaluationResult.null();
  if (!left.primitive() || !right.primitive()) {
    return EvaluationResult.bool(false);
  }
  const ls = left.coerceString().toLowerCase();
  const rs = right.coerceString().toLowerCase();
  return EvaluationResult.bool(test(ls, rs));
}

/**
 * startswith(searchString, searchValue) -> bool
 */
export const startsWithFn: FunctionDef = {
  name: "startswith",
  arity: 2,
  description: "True if searchString starts with searchValue, ignoring case.",
  call(args) {
    return affixTest(args, (s, affix) => s.startsWith(affix));
  },
};

/**
 * endswith(searchString, searchValue) -> bool
 */
export const endsWithFn: FunctionDef = {
  name: "endswith",
  arity: 2,
  description: "True if searchString ends with searchValue, ignoring case.",
  call(args) {
    return affixTest(args, (s, affix) => s.endsWith(affix));
  },
};

function formatError(template: string, reason: string): EvaluationError {
  return new EvaluationError("E_FORMAT", `format: ${reason} in '${template}'`, { template });
}

/**
 * format(template, ...args) -> str
 * `{N}` is replaced by the string form of args[N]; `{{` and `}}` are literal braces.
 */
export const formatFn: FunctionDef = {
  name: "format",
  arity: -1,
  description: "Replaces {0}, {1}, ... in the template with the remaining arguments.",
  call(args) {
    const template = (args[0] ?? EvaluationResult.null()).coerceString();
    const values = args.slice(1);
    let out = "";
    let i = 0;
    while (i < template.length) {
      const ch = template[i];
      if (ch === "{") {
        if (template[i + 1] === "{") {
          out += "{";
          i += 2;
          continue;
        }
        const close = template.indexOf("}", i + 1);
        if (close < 0) throw formatError(template, "unclosed '{'");
        const index = template.slice(i + 1, close);
        if (!/^\d+$/.test(index)) throw formatError(template, `invalid argument index '${index}'`);
        const arg = values[Number(index)];
        if (!arg) throw formatError(template, `argument index ${index} out of range`);
        out += arg.coerceString();
        i = close + 1;
      } else if (ch === "}") {
        if (template[i + 1] !== "}") throw formatError(template, "unmatched '}'");
        out += "}";
        i += 2;
      } else {
        out += ch;
        i += 1;
      }
    }
    return EvaluationResult.string(out);
  },
};
