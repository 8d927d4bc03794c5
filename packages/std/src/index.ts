/**
 * @ghexpr/std - built-in expression functions
 */
import { createRegistry } from "@ghexpr/core";
import type { FunctionRegistry } from "@ghexpr/core";
import { containsFn } from "./predicates.js";
import { startsWithFn, endsWithFn, formatFn } from "./string-ops.js";
import { joinFn } from "./list-ops.js";
import { fromJsonFn, toJsonFn } from "./parse-json.js";

export { containsFn } from "./predicates.js";
export { startsWithFn, endsWithFn, formatFn } from "./string-ops.js";
export { joinFn } from "./list-ops.js";
export { fromJsonFn, toJsonFn, toExprValue } from "./parse-json.js";

/**
 * Registry of every built-in, created once at load.
 */
export const builtinFunctions: FunctionRegistry = createRegistry([
  containsFn,
  startsWithFn,
  endsWithFn,
  joinFn,
  fromJsonFn,
  toJsonFn,
  formatFn,
]);
