import type { DisplayConfig } from "../config/types.js";
import { formatLocal } from "../utils/time.js";
import { calcAbv } from "./gravity.js";
import type { ArchiveRecord } from "./types.js";

const RULE = "-".repeat(40);

/** Plain-text record of an archived brew, as shown by the history viewer. */
export function formatArchiveReport(record: ArchiveRecord, display: DisplayConfig): string {
  const abv = record.og && record.fg ? calcAbv(record.og, record.fg) : 0;

  const lines = [
    `BREW RECORD: ${record.name}`,
    `Category: ${record.category}`,
    `Archived from: ${record.archived_from}`,
    `Started:  ${formatLocal(record.start_date, display)}`,
    RULE,
    "METRICS",
    `Original Gravity: ${record.og.toFixed(3)}`,
    `Final Gravity:    ${record.fg.toFixed(3)}`,
    `ABV:              ${abv.toFixed(1)}%`,
    "",
    `Original Volume:  ${record.original_volume} L`,
    `Final Volume:     ${record.volume} L`,
    RULE,
    "Recipe:",
    record.recipe,
    "",
    "Notes:",
    record.notes,
    "",
    RULE,
    "EVENT LOG",
    ...record.log.map(
      (entry) => `[${formatLocal(entry.time, display)}] ${entry.type}: ${entry.text}`,
    ),
  ];

  return lines.join("\n");
}
