import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import type { FermtrackConfig } from "./types.js";
import { getConfigPath } from "./paths.js";
import { parseConfig } from "./schema.js";

const ENV_PATTERN = /\$\{env:([A-Z_][A-Z0-9_]*)\}/g;

export function substituteEnv(raw: string): string {
  return raw.replace(ENV_PATTERN, (match, varName: string) => {
    const value = process.env[varName];
    if (value === undefined) {
      throw new Error(`Missing environment variable: ${varName} (referenced as ${match})`);
    }
    return value;
  });
}

/** Expands `${env:NAME}` references in config text, then parses and validates it. */
export function parseConfigText(content: string, source: string): FermtrackConfig {
  const substituted = substituteEnv(content);

  let raw: unknown;
  try {
    raw = JSON.parse(substituted);
  } catch (err) {
    throw new SyntaxError(
      `${source} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  return parseConfig(raw);
}

/**
 * Reads the fermtrack config from `path`, FERMTRACK_CONFIG_PATH or
 * ./fermtrack.config.json. A missing file means every default applies.
 */
export function loadConfig(path?: string): FermtrackConfig {
  const configPath = resolve(path ?? getConfigPath());

  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      return parseConfig({});
    }
    throw err;
  }

  return parseConfigText(content, configPath);
}
