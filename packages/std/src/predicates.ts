/**
 * ghexpr built-in: contains
 */
import { EvaluationResult } from "@ghexpr/core";
import type { FunctionDef } from "@ghexpr/core";

/**
 * contains(search, item) -> bool
 * - primitive search: case-insensitive substring check of both string coercions
 * - array search: element membership using expression equality
 * - object search: always false
 */
export const containsFn: FunctionDef = {
  name: "contains",
  arity: 2,
  description: "True if search contains item (substring or array element), ignoring case.",
  call(args) {
    const search = args[0] ?? EvaluationResult.null();
    const item = args[1] ?? EvaluationResult.null();

    // only primitives can be a substring or an array element
    if (!item.primitive()) return EvaluationResult.bool(false);

    if (search.primitive()) {
      const haystack = search.coerceString().toLowerCase();
      const needle = item.coerceString().toLowerCase();
      return EvaluationResult.bool(haystack.includes(needle));
    }

    switch (search.type) {
      case "array": {
        const elements = search.coerceSlice();
        if (!elements) return EvaluationResult.bool(false);
        return EvaluationResult.bool(elements.some((el) => item.equals(el)));
      }
      case "object":
      default:
        return EvaluationResult.bool(false);
    }
  },
};
