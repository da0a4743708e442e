import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { loadConfig, substituteEnv } from "../../src/config/loader.js";
import { getConfigPath, getStateDir } from "../../src/config/paths.js";
import { DEFAULT_CATEGORIES, parseConfig } from "../../src/config/schema.js";

describe("substituteEnv", () => {
  beforeEach(() => {
    vi.stubEnv("TEST_ZONE", "Europe/Berlin");
    vi.stubEnv("TEST_FILE", "cellar.json");
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("substitutes env vars in text", () => {
    expect(substituteEnv("zone: ${env:TEST_ZONE}")).toBe("zone: Europe/Berlin");
  });

  it("substitutes multiple env vars", () => {
    expect(substituteEnv("${env:TEST_ZONE}:${env:TEST_FILE}")).toBe("Europe/Berlin:cellar.json");
  });

  it("throws for missing env var", () => {
    expect(() => substituteEnv("${env:MISSING_VAR}")).toThrow(
      "Missing environment variable: MISSING_VAR",
    );
  });

  it("only matches uppercase var names", () => {
    const text = "${env:lowercase}";
    expect(substituteEnv(text)).toBe(text);
  });
});

describe("parseConfig", () => {
  it("parses minimal config with defaults", () => {
    const config = parseConfig({});
    expect(config.slots.defaultCount).toBe(5);
    expect(config.vocabulary.categories).toEqual(DEFAULT_CATEGORIES);
    expect(config.vocabulary.stages[0]).toBe("Primary");
    expect(config.vocabulary.eventTypes[0]).toBe("General");
    expect(config.display).toEqual({
      timezone: "America/New_York",
      datePattern: "%Y-%m-%d %H:%M",
    });
    expect(config.storage).toEqual({
      stateFile: "brews.json",
      historyFile: "brew_history.json",
    });
    expect(config.logging.level).toBe("warn");
  });

  it("keeps overrides and fills the rest", () => {
    const config = parseConfig({
      slots: { defaultCount: 2 },
      vocabulary: { categories: ["Sake"] },
    });
    expect(config.slots.defaultCount).toBe(2);
    expect(config.vocabulary.categories).toEqual(["Sake"]);
    expect(config.vocabulary.stages).toHaveLength(6);
  });

  it("rejects a negative slot count", () => {
    expect(() => parseConfig({ slots: { defaultCount: -1 } })).toThrow();
  });

  it("rejects an unknown log level", () => {
    expect(() => parseConfig({ logging: { level: "chatty" } })).toThrow();
  });
});

describe("loadConfig", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), "fermtrack-config-"));
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    rmSync(tempDir, { recursive: true, force: true });
  });

  it("returns defaults when the file is missing", () => {
    const config = loadConfig(join(tempDir, "absent.json"));
    expect(config.slots.defaultCount).toBe(5);
  });

  it("reads the file with env substitution", () => {
    vi.stubEnv("TEST_ZONE", "Asia/Tokyo");
    const path = join(tempDir, "config.json");
    writeFileSync(path, JSON.stringify({ display: { timezone: "${env:TEST_ZONE}" } }));

    expect(loadConfig(path).display.timezone).toBe("Asia/Tokyo");
  });

  it("follows FERMTRACK_CONFIG_PATH", () => {
    const path = join(tempDir, "from-env.json");
    writeFileSync(path, JSON.stringify({ slots: { defaultCount: 8 } }));
    vi.stubEnv("FERMTRACK_CONFIG_PATH", path);

    expect(getConfigPath()).toBe(path);
    expect(loadConfig().slots.defaultCount).toBe(8);
  });

  it("throws on malformed JSON", () => {
    const path = join(tempDir, "broken.json");
    writeFileSync(path, "{ nope");
    expect(() => loadConfig(path)).toThrow(SyntaxError);
    expect(() => loadConfig(path)).toThrow(`${path} is not valid JSON`);
  });
});

describe("getStateDir", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("prefers FERMTRACK_STATE_DIR", () => {
    vi.stubEnv("FERMTRACK_STATE_DIR", "/tmp/fermtrack-elsewhere");
    expect(getStateDir()).toBe("/tmp/fermtrack-elsewhere");
  });
});
