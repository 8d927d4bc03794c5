/**
 * ghexpr configuration loader.
 */
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { z } from "zod";

export const configSchema = z.object({
  version: z.number().default(1),
  disable: z.array(z.string(), { invalid_type_error: "Config 'disable' must be an array of function names." }).default([]),
});

export type Config = z.infer<typeof configSchema>;

export interface ResolvedConfig {
  config: Config;
  source: "project" | "user" | "default";
  path: string | null;
}

export const PROJECT_CONFIG_FILE = ".ghexprrc.json";

const DEFAULT_CONFIG: Config = {
  version: 1,
  disable: [],
};

/**
 * Precedence: ./.ghexprrc.json > ~/.ghexpr/config.json > default
 */
export function resolveConfig(cwd?: string, homeDir?: string): ResolvedConfig {
  const projectPath = path.join(cwd ?? process.cwd(), PROJECT_CONFIG_FILE);
  const userPath = path.join(homeDir ?? os.homedir(), ".ghexpr", "config.json");

  const projectConfig = tryLoadConfigFile(projectPath);
  if (projectConfig) {
    return { config: projectConfig, source: "project", path: projectPath };
  }

  const userConfig = tryLoadConfigFile(userPath);
  if (userConfig) {
    return { config: userConfig, source: "user", path: userPath };
  }

  return { config: DEFAULT_CONFIG, source: "default", path: null };
}

export function loadConfig(cwd?: string, homeDir?: string): Config {
  return resolveConfig(cwd, homeDir).config;
}

// Missing, unreadable or malformed files fall through to the next source.
function tryLoadConfigFile(filePath: string): Config | null {
  if (!fs.existsSync(filePath)) return null;
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch {
    return null;
  }
  const parsed = configSchema.safeParse(data);
  return parsed.success ? parsed.data : null;
}
