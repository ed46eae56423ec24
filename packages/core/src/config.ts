/**
 * minipas configuration loader.
 */
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { DEFAULT_MAX_CALL_DEPTH } from "./interpreter.js";

export const ConfigSchema = z.object({
  version: z.number().int().positive().default(1),
  limits: z
    .object({
      maxCallDepth: z.number().int().positive().default(DEFAULT_MAX_CALL_DEPTH),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

export interface ResolvedConfig {
  config: Config;
  source: "project" | "user" | "default";
  path: string | null;
}

export const PROJECT_CONFIG_FILE = ".minipasrc.json";

/**
 * Load configuration from project or user config.
 * Precedence: ./.minipasrc.json > ~/.minipas/config.json > defaults
 */
export function resolveConfig(cwd?: string, homeDir?: string): ResolvedConfig {
  const projectPath = path.join(cwd ?? process.cwd(), PROJECT_CONFIG_FILE);
  const userPath = path.join(homeDir ?? os.homedir(), ".minipas", "config.json");

  const projectConfig = readConfigFile(projectPath);
  if (projectConfig) {
    return { config: projectConfig, source: "project", path: projectPath };
  }

  const userConfig = readConfigFile(userPath);
  if (userConfig) {
    return { config: userConfig, source: "user", path: userPath };
  }

  return { config: ConfigSchema.parse({}), source: "default", path: null };
}

export function loadConfig(cwd?: string, homeDir?: string): Config {
  return resolveConfig(cwd, homeDir).config;
}

// A missing file is skipped; a present but broken one is an error.
function readConfigFile(filePath: string): Config | null {
  if (!fs.existsSync(filePath)) return null;

  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new ConfigError(`Cannot read config file '${filePath}': ${msg}`, { path: filePath });
  }

  const result = ConfigSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join(".") : "(root)";
    throw new ConfigError(
      `Invalid config file '${filePath}': ${where}: ${issue?.message ?? "invalid value"}`,
      { path: filePath }
    );
  }
  return result.data;
}
