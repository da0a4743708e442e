import { readFile } from "node:fs/promises";
import { mkdirSync } from "node:fs";
import { join } from "node:path";
import { parseHistory } from "../brew/schema.js";
import type { ArchiveRecord } from "../brew/types.js";
import type { Logger } from "../logging/logger.js";
import { writeFileAtomic } from "../utils/atomic-write.js";
import { withFileLock } from "../utils/file-lock.js";

/** Archived brews, newest first. Writes are atomic: temp file, fsync, rename. */
export class HistoryStore {
  readonly filePath: string;
  private readonly logger: Logger;

  constructor(dataDir: string, fileName: string, logger: Logger) {
    mkdirSync(dataDir, { recursive: true });
    this.filePath = join(dataDir, fileName);
    this.logger = logger.child({ component: "history-store" });
  }

  async load(): Promise<ArchiveRecord[]> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf-8");
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code !== "ENOENT") {
        this.logger.warn({ err, file: this.filePath }, "Could not read history file; starting empty");
      }
      return [];
    }

    try {
      const data = JSON.parse(raw) as unknown;
      const records = parseHistory(data);
      if (Array.isArray(data) && records.length < data.length) {
        this.logger.warn(
          { file: this.filePath, skipped: data.length - records.length },
          "Skipped history entries that are not records",
        );
      }
      return records;
    } catch (err) {
      this.logger.warn({ err, file: this.filePath }, "History file is malformed; starting empty");
      return [];
    }
  }

  async save(records: readonly ArchiveRecord[]): Promise<void> {
    const data = JSON.stringify(records, null, 2);
    await withFileLock(this.filePath, () => writeFileAtomic(this.filePath, data));
  }
}
