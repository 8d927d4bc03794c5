/**
 * Function registry and dispatch.
 */
import type { Span } from "./diagnostics.js";
import { ArityError, ExprError, UnknownFunctionError } from "./errors.js";
import type { EvaluationResult, ExprObject } from "./values.js";

export interface FunctionDef {
  name: string;
  /**
   * Required argument count. Positive: exactly that many. Negative: at least abs(arity).
   */
  arity: number;
  /** Upper bound for variadic functions. */
  maxArgs?: number;
  description: string;
  call(args: readonly EvaluationResult[]): EvaluationResult;
}

export type FunctionRegistry = ReadonlyMap<string, FunctionDef>;

export type CallTraceEventType = "call_start" | "call_end" | "call_error";

export interface CallTraceEvent {
  ts: string;
  event: CallTraceEventType;
  fn: string;
  argc: number;
  span?: Span;
  data?: ExprObject;
}

export interface CallOptions {
  span?: Span;
  trace?: (event: CallTraceEvent) => void;
}

export function createRegistry(defs: Iterable<FunctionDef>): FunctionRegistry {
  const fns = new Map<string, FunctionDef>();
  for (const def of defs) {
    const key = def.name.toLowerCase();
    if (fns.has(key)) {
      throw new Error(`Duplicate function definition '${def.name}'.`);
    }
    fns.set(key, def);
  }
  return fns;
}

/**
 * A copy of the registry without the named functions.
 */
export function restrictRegistry(registry: FunctionRegistry, disabled: Iterable<string>): FunctionRegistry {
  const drop = new Set([...disabled].map((n) => n.toLowerCase()));
  return createRegistry([...registry.values()].filter((def) => !drop.has(def.name.toLowerCase())));
}

export function lookupFunction(registry: FunctionRegistry, name: string): FunctionDef | undefined {
  return registry.get(name.toLowerCase());
}

/**
 * "2", "1..2" or "1+".
 */
export function formatArity(def: FunctionDef): string {
  if (def.arity >= 0) return String(def.arity);
  const min = -def.arity;
  return def.maxArgs !== undefined ? `${min}..${def.maxArgs}` : `${min}+`;
}

export function checkArity(def: FunctionDef, count: number): void {
  const ok =
    def.arity >= 0
      ? count === def.arity
      : count >= -def.arity && (def.maxArgs === undefined || count <= def.maxArgs);
  if (!ok) {
    throw new ArityError(def.name, formatArity(def), count);
  }
}

/**
 * Look up `name`, validate the argument count and invoke the implementation.
 * Errors propagate unchanged apart from the call's span being attached.
 */
export function callFunction(
  registry: FunctionRegistry,
  name: string,
  args: readonly EvaluationResult[],
  options: CallOptions = {}
): EvaluationResult {
  const emit = (event: CallTraceEventType, data?: ExprObject): void => {
    if (options.trace) {
      options.trace({
        ts: new Date().toISOString(),
        event,
        fn: name,
        argc: args.length,
        ...(options.span ? { span: options.span } : {}),
        ...(data ? { data } : {}),
      });
    }
  };

  emit("call_start");
  try {
    const def = lookupFunction(registry, name);
    if (!def) {
      throw new UnknownFunctionError(name);
    }
    checkArity(def, args.length);
    const result = def.call(args);
    emit("call_end", { type: result.type });
    return result;
  } catch (e) {
    if (e instanceof ExprError) {
      if (options.span && !e.span) e.span = options.span;
      emit("call_error", { code: e.code, message: e.message });
    } else {
      emit("call_error", { code: "E_RUNTIME", message: e instanceof Error ? e.message : String(e) });
    }
    throw e;
  }
}
