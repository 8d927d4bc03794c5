/**
 * ghexpr call - invoke a built-in function
 */
import * as fs from "node:fs";
import {
  callFunction,
  diagnosticFromError,
  formatDiagnostic,
  loadConfig,
  restrictRegistry,
  EvaluationResult,
  ExprError,
  isExprValue,
} from "@ghexpr/core";
import type { CallTraceEvent } from "@ghexpr/core";
import { builtinFunctions } from "@ghexpr/std";

class CliIoError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliIoError";
  }
}

/**
 * Arguments are JSON literals; anything that does not decode is taken as a plain string.
 */
export function parseCliArg(text: string): EvaluationResult {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return EvaluationResult.string(text);
  }
  return isExprValue(raw) ? EvaluationResult.of(raw) : EvaluationResult.string(text);
}

export async function runCall(
  fn: string,
  rawArgs: string[],
  opts: { trace?: string; pretty?: boolean; cwd?: string; homeDir?: string }
): Promise<number> {
  const pretty = !!opts.pretty;
  const emitError = (e: unknown): void => {
    console.error(formatDiagnostic(diagnosticFromError(e), pretty));
  };

  const config = loadConfig(opts.cwd, opts.homeDir);
  const registry = restrictRegistry(builtinFunctions, config.disable);
  const args = rawArgs.map(parseCliArg);

  let traceFd: number | null = null;
  if (opts.trace) {
    try {
      traceFd = fs.openSync(opts.trace, "w");
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      console.error(formatDiagnostic({ code: "E_IO", message: `Error opening trace file: ${msg}` }, pretty));
      return 4;
    }
  }

  const fd = traceFd;
  const traceHandler =
    fd !== null
      ? (event: CallTraceEvent) => {
          try {
            fs.writeSync(fd, JSON.stringify(event) + "\n");
          } catch (e) {
            const msg = e instanceof Error ? e.message : String(e);
            throw new CliIoError(`Error writing trace file: ${msg}`);
          }
        }
      : undefined;

  try {
    const result = callFunction(registry, fn, args, { trace: traceHandler });
    console.log(JSON.stringify({ type: result.type, value: result.value }, null, 2));
    return 0;
  } catch (e) {
    if (e instanceof CliIoError) {
      console.error(formatDiagnostic({ code: "E_IO", message: e.message }, pretty));
      return 4;
    }
    emitError(e);
    if (e instanceof ExprError && (e.code === "E_UNKNOWN_FN" || e.code === "E_ARITY")) return 2;
    return 4;
  } finally {
    if (traceFd !== null) {
      fs.closeSync(traceFd);
    }
  }
}
