#!/usr/bin/env node
/**
 * ghexpr - workflow expression function CLI
 */
import { createRequire } from "node:module";
import { Command } from "commander";
import { runCall } from "./cmd-call.js";
import { runList } from "./cmd-list.js";
import { runConfig } from "./cmd-config.js";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version: string };

const program = new Command();

program
  .name("ghexpr")
  .description("ghexpr: built-in functions of workflow expressions")
  .version(pkg.version);

program
  .command("call")
  .description("Call a built-in function with JSON literal arguments")
  .argument("<fn>", "Function name, e.g. contains")
  .argument("[args...]", "Arguments as JSON literals; other text is passed as a string")
  .option("--trace <path>", "Write JSONL trace to file")
  .option("--pretty", "Human-readable error output", false)
  .action(async (fn: string, args: string[], opts: { trace?: string; pretty?: boolean }) => {
    const code = await runCall(fn, args, opts);
    process.exit(code);
  });

program
  .command("list")
  .description("List the available functions")
  .option("--json", "Output as JSON", false)
  .action(async (opts: { json?: boolean }) => {
    const code = await runList(opts);
    process.exit(code);
  });

program
  .command("config")
  .description("Display effective configuration and its source")
  .option("--json", "Output as JSON", false)
  .action(async (opts: { json?: boolean }) => {
    const code = await runConfig(opts);
    process.exit(code);
  });

// Reject unknown commands before Commander parses (prevents --help from masking exit code)
const knownCommands = new Set(["call", "list", "config", "help"]);
const userArgs = process.argv.slice(2);
const firstPositional = userArgs.find((a) => !a.startsWith("-"));
if (firstPositional && !knownCommands.has(firstPositional)) {
  console.error(`Unknown command: ${firstPositional}`);
  process.exit(1);
}

program.parseAsync().catch((e: unknown) => {
  console.error(e instanceof Error ? e.message : String(e));
  process.exit(1);
});
