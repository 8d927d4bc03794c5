/**
 * @ghexpr/core - value model, errors and function dispatch
 */
export {
  EvaluationResult,
  getExprType,
  exprValueSchema,
  isExprValue,
} from "./values.js";
export type { ExprType, ExprValue, ExprObject } from "./values.js";
export {
  ExprError,
  UnknownFunctionError,
  ArityError,
  EvaluationError,
  JsonParseError,
  UnsupportedTypeError,
} from "./errors.js";
export * from "./diagnostics.js";
export {
  createRegistry,
  restrictRegistry,
  lookupFunction,
  formatArity,
  checkArity,
  callFunction,
} from "./functions.js";
export type {
  FunctionDef,
  FunctionRegistry,
  CallOptions,
  CallTraceEvent,
  CallTraceEventType,
} from "./functions.js";
export { resolveConfig, loadConfig, configSchema, PROJECT_CONFIG_FILE } from "./config.js";
export type { Config, ResolvedConfig } from "./config.js";
