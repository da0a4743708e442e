import { readFile, writeFile } from "node:fs/promises";
import { mkdirSync } from "node:fs";
import { join } from "node:path";
import { Brew } from "../brew/brew.js";
import { parseBrewFields } from "../brew/schema.js";
import type { BrewVocabulary } from "../brew/types.js";
import type { Logger } from "../logging/logger.js";
import { withFileLock } from "../utils/file-lock.js";
import {
  defaultSlotName,
  defaultSlots,
  serializeSlot,
  type VesselSlot,
} from "./types.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// null, {} and anything that is not a mapping mean "no brew here".
function hasPayload(value: unknown): value is Record<string, unknown> {
  return isRecord(value) && Object.keys(value).length > 0;
}

export interface SlotLoadOptions {
  readonly defaultCount: number;
  readonly vocabulary?: BrewVocabulary;
}

/**
 * Active vessel slots. Reads both the current `{ name, brew }` layout and the
 * legacy layout where each element was a bare brew mapping (or null).
 */
export class SlotStore {
  readonly filePath: string;
  private readonly logger: Logger;

  constructor(dataDir: string, fileName: string, logger: Logger) {
    mkdirSync(dataDir, { recursive: true });
    this.filePath = join(dataDir, fileName);
    this.logger = logger.child({ component: "slot-store" });
  }

  async load(options: SlotLoadOptions): Promise<VesselSlot[]> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf-8");
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code !== "ENOENT") {
        this.logger.warn({ err, file: this.filePath }, "Could not read state file; using default slots");
      }
      return defaultSlots(options.defaultCount);
    }

    try {
      return this.decode(JSON.parse(raw) as unknown, options);
    } catch (err) {
      this.logger.warn({ err, file: this.filePath }, "State file is malformed; using default slots");
      return defaultSlots(options.defaultCount);
    }
  }

  async save(slots: readonly VesselSlot[]): Promise<void> {
    const data = JSON.stringify(slots.map(serializeSlot), null, 2);
    await withFileLock(this.filePath, async () => {
      await writeFile(this.filePath, data);
    });
  }

  private decode(data: unknown, options: SlotLoadOptions): VesselSlot[] {
    if (!Array.isArray(data)) {
      this.logger.warn({ file: this.filePath }, "State file is not a list; using default slots");
      return defaultSlots(options.defaultCount);
    }

    let migrated = 0;
    const slots = data.map((item: unknown, i): VesselSlot => {
      if (isRecord(item) && "name" in item && "brew" in item) {
        const name = item["name"];
        return {
          name: typeof name === "string" ? name : String(name ?? defaultSlotName(i + 1)),
          brew: this.rebuild(item["brew"], options),
        };
      }
      migrated++;
      return { name: defaultSlotName(i + 1), brew: this.rebuild(item, options) };
    });

    if (migrated > 0) {
      this.logger.info({ migrated }, "Migrated legacy slot entries");
    }
    return slots;
  }

  private rebuild(payload: unknown, options: SlotLoadOptions): Brew | undefined {
    if (!hasPayload(payload)) return undefined;
    return Brew.fromRecord(parseBrewFields(payload), options.vocabulary);
  }
}
