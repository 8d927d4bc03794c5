/**
 * ghexpr list - effective built-in functions
 */
import { formatArity, loadConfig, restrictRegistry } from "@ghexpr/core";
import { builtinFunctions } from "@ghexpr/std";

export async function runList(
  opts: { json?: boolean; cwd?: string; homeDir?: string }
): Promise<number> {
  const config = loadConfig(opts.cwd, opts.homeDir);
  const registry = restrictRegistry(builtinFunctions, config.disable);
  const defs = [...registry.values()].sort((a, b) => a.name.localeCompare(b.name));

  if (opts.json) {
    console.log(
      JSON.stringify(
        defs.map((def) => ({ name: def.name, arity: formatArity(def), description: def.description })),
        null,
        2
      )
    );
    return 0;
  }

  const width = Math.max(0, ...defs.map((def) => def.name.length));
  for (const def of defs) {
    console.log(`  ${def.name.padEnd(width)}  (${formatArity(def)})  ${def.description}`);
  }
  return 0;
}
