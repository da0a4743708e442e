import { writeFileSync } from "node:fs";
import { join } from "node:path";
import { Writable } from "node:stream";
import { Cli } from "clipanion";
import { vi } from "vitest";
import { createCli } from "../../src/cli/program.js";
import { parseConfig } from "../../src/config/schema.js";
import type { FermtrackConfig } from "../../src/config/types.js";
import { createLogger, type Logger } from "../../src/logging/logger.js";

export function makeConfig(overrides: Record<string, unknown> = {}): FermtrackConfig {
  return parseConfig({
    slots: { defaultCount: 3 },
    display: { timezone: "UTC", datePattern: "%Y-%m-%d %H:%M" },
    logging: { level: "silent", json: true },
    ...overrides,
  });
}

export function makeLogger(): Logger {
  return createLogger({ level: "silent", json: true });
}

export function captureStdout(): { stream: Writable; output: () => string } {
  let buf = "";
  const stream = new Writable({
    write(chunk, _encoding, cb) {
      buf += chunk.toString();
      cb();
    },
  });
  return { stream, output: () => buf };
}

/** Runs the real CLI against argv and returns its exit code and stdout. */
export async function runCli(argv: string[]): Promise<{ code: number; output: string }> {
  const { stream, output } = captureStdout();
  const code = await createCli().run(argv, { ...Cli.defaultContext, stdout: stream });
  return { code, output: output() };
}

/** Points the CLI at a fresh state dir and a quiet config file inside it. */
export function stubWorkspace(tempDir: string, config: Record<string, unknown> = {}): string {
  const configPath = join(tempDir, "fermtrack.test-config.json");
  writeFileSync(
    configPath,
    JSON.stringify({
      slots: { defaultCount: 3 },
      display: { timezone: "UTC" },
      logging: { level: "silent", json: true },
      ...config,
    }),
  );
  vi.stubEnv("FERMTRACK_STATE_DIR", tempDir);
  vi.stubEnv("FERMTRACK_CONFIG_PATH", configPath);
  return configPath;
}
