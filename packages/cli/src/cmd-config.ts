/**
 * ghexpr config - effective configuration summary command
 */
import { resolveConfig, restrictRegistry } from "@ghexpr/core";
import { builtinFunctions } from "@ghexpr/std";

function sortStrings(values: string[]): string[] {
  return [...values].sort((a, b) => a.localeCompare(b));
}

export async function runConfig(
  opts: { json?: boolean; cwd?: string; homeDir?: string }
): Promise<number> {
  const resolved = resolveConfig(opts.cwd, opts.homeDir);
  const disable = sortStrings(resolved.config.disable);
  const enabled = sortStrings(
    [...restrictRegistry(builtinFunctions, resolved.config.disable).values()].map((def) => def.name)
  );

  if (opts.json) {
    console.log(
      JSON.stringify(
        {
          source: resolved.source,
          path: resolved.path,
          config: {
            version: resolved.config.version,
            disable,
          },
          enabled,
        },
        null,
        2
      )
    );
    return 0;
  }

  const formatList = (items: string[]): string => (items.length > 0 ? items.join(", ") : "(none)");

  console.log("Effective ghexpr config");
  console.log(`  Source:   ${resolved.source}`);
  console.log(`  Path:     ${resolved.path ?? "(none)"}`);
  console.log(`  Disabled: ${formatList(disable)}`);
  console.log(`  Enabled:  ${formatList(enabled)}`);
  return 0;
}
