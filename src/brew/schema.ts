import { z } from "zod";
import { parseDecimal } from "./gravity.js";
import type { ArchiveRecord, BrewFields, LogEntry } from "./types.js";

// Persisted files may come from older versions or hand edits, so field
// readers coerce where they can and drop what they cannot read. Only a
// value that is not a mapping at all is rejected.

const text = z.preprocess(
  (value) => (value === null || value === undefined ? undefined : String(value)),
  z.string().optional(),
);

// "1.060" and 1.06 both read as 1.06; anything else reads as absent.
const numeric = z
  .preprocess(
    (value) => (typeof value === "string" ? parseDecimal(value) : value),
    z.number().finite().optional(),
  )
  .catch(undefined);

const logEntrySchema = z.object({ time: text, type: text, text: text });

const logSchema = z
  .array(z.unknown())
  .transform((items) =>
    items.flatMap((item): LogEntry[] => {
      const entry = logEntrySchema.safeParse(item);
      if (!entry.success) return [];
      return [
        {
          time: entry.data.time ?? "",
          type: entry.data.type ?? "General",
          text: entry.data.text ?? "",
        },
      ];
    }),
  )
  .optional()
  .catch(undefined);

const brewFieldsSchema = z.object({
  id: text,
  name: text,
  category: text,
  recipe: text,
  notes: text,
  start_date: text,
  stage: text,
  volume: numeric,
  original_volume: numeric,
  og: numeric,
  fg: numeric,
  ph: numeric,
  temp: numeric,
  log: logSchema,
});

const archiveFieldsSchema = brewFieldsSchema.extend({ archived_from: text });

/** Reads a persisted brew mapping. Unknown keys are dropped; a non-mapping throws. */
export function parseBrewFields(raw: unknown): BrewFields {
  return brewFieldsSchema.parse(raw);
}

/**
 * Reads the history file's list. A record missing fields is completed rather
 * than discarded (`original_volume` falls back to `volume`); entries that are
 * not mappings are skipped. Throws only when the list itself is not an array.
 */
export function parseHistory(raw: unknown): ArchiveRecord[] {
  return z
    .array(z.unknown())
    .parse(raw)
    .flatMap((item): ArchiveRecord[] => {
      const fields = archiveFieldsSchema.safeParse(item);
      if (!fields.success) return [];

      const record = fields.data;
      const volume = record.volume ?? 0;
      return [
        {
          id: record.id ?? "",
          name: record.name ?? "Untitled",
          category: record.category ?? "",
          recipe: record.recipe ?? "",
          notes: record.notes ?? "",
          start_date: record.start_date ?? "",
          stage: record.stage ?? "",
          volume,
          original_volume: record.original_volume ?? volume,
          og: record.og ?? 0,
          fg: record.fg ?? 0,
          ph: record.ph ?? 0,
          temp: record.temp ?? 0,
          log: record.log ?? [],
          archived_from: record.archived_from ?? "",
        },
      ];
    });
}
