import { homedir } from "node:os";
import { join } from "node:path";

export function getStateDir(): string {
  return process.env["FERMTRACK_STATE_DIR"] ?? join(homedir(), ".fermtrack");
}

export function getConfigPath(): string {
  return process.env["FERMTRACK_CONFIG_PATH"] ?? "fermtrack.config.json";
}
