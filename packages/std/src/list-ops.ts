/**
 * ghexpr built-in: join
 */
import { EvaluationResult, EvaluationError } from "@ghexpr/core";
import type { FunctionDef } from "@ghexpr/core";

/**
 * join(array, separator = ",") -> str
 * A primitive first argument is returned as-is.
 */
export const joinFn: FunctionDef = {
  name: "join",
  arity: -1,
  maxArgs: 2,
  description: "Joins array elements with the separator (default ','); primitives pass through.",
  call(args) {
    const input = args[0] ?? EvaluationResult.null();
    if (input.primitive()) return input;

    const elements = input.coerceSlice();
    if (!elements) {
      throw new EvaluationError(
        "E_JOIN_ARG",
        `join: first argument must be an array or a primitive, got ${input.type}`,
        { received: input.type }
      );
    }

    const sep = args[1] !== undefined ? args[1].coerceString() : ",";
    return EvaluationResult.string(elements.map((el) => el.coerceString()).join(sep));
  },
};
