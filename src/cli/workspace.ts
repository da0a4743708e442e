import { loadConfig } from "../config/loader.js";
import { getStateDir } from "../config/paths.js";
import type { FermtrackConfig } from "../config/types.js";
import { FermenterManager } from "../fermenter/manager.js";
import { createLogger, type Logger } from "../logging/logger.js";

export interface Workspace {
  readonly config: FermtrackConfig;
  readonly logger: Logger;
  readonly manager: FermenterManager;
}

export async function openWorkspace(): Promise<Workspace> {
  const config = loadConfig();
  const logger = createLogger(config.logging);
  const manager = new FermenterManager({ config, dataDir: getStateDir(), logger });
  await manager.load();
  return { config, logger, manager };
}

/** Converts a 1-based position typed by the user into a slot index. */
export function parsePosition(text: string, count: number): number | undefined {
  if (!/^\d+$/.test(text.trim())) return undefined;
  const position = Number(text);
  return position >= 1 && position <= count ? position - 1 : undefined;
}
