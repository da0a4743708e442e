import { isoNow } from "../utils/time.js";
import { calcAbv } from "./gravity.js";
import type {
  BrewDetails,
  BrewFields,
  BrewRecord,
  BrewVocabulary,
  LogEntry,
} from "./types.js";

const FALLBACK_CATEGORY = "Beer";
const FALLBACK_STAGE = "Primary";

/**
 * A single fermentation batch. Identity, start date and original volume are
 * fixed at creation; the log only grows, except for explicit deletion.
 */
export class Brew {
  readonly id: string;
  readonly startDate: string;
  readonly originalVolume: number;

  name: string;
  category: string;
  stage: string;
  recipe: string;
  notes: string;
  volume: number;
  og: number;
  fg: number;
  ph: number;
  temp: number;

  private readonly entries: LogEntry[];

  private constructor(record: BrewRecord) {
    this.id = record.id;
    this.name = record.name;
    this.category = record.category;
    this.recipe = record.recipe;
    this.notes = record.notes;
    this.startDate = record.start_date;
    this.stage = record.stage;
    this.volume = record.volume;
    this.originalVolume = record.original_volume;
    this.og = record.og;
    this.fg = record.fg;
    this.ph = record.ph;
    this.temp = record.temp;
    this.entries = record.log.map((entry) => ({ ...entry }));
  }

  /** Builds a brew from partial fields, filling every omitted one. */
  static create(fields: BrewFields = {}, vocabulary?: BrewVocabulary): Brew {
    const volume = fields.volume ?? 0;
    const brew = new Brew({
      id: fields.id || `brew_${Date.now()}`,
      name: fields.name ?? "Untitled",
      category: fields.category ?? vocabulary?.categories[0] ?? FALLBACK_CATEGORY,
      recipe: fields.recipe ?? "",
      notes: fields.notes ?? "",
      start_date: fields.start_date || isoNow(),
      stage: fields.stage ?? vocabulary?.stages[0] ?? FALLBACK_STAGE,
      volume,
      original_volume: fields.original_volume ?? volume,
      og: fields.og ?? 0,
      fg: fields.fg ?? 0,
      ph: fields.ph ?? 0,
      temp: fields.temp ?? 0,
      log: fields.log ?? [],
    });

    if (brew.entries.length === 0) {
      brew.addEvent("Lifecycle", `Created: ${brew.name}. Start Vol: ${brew.volume}L`);
    }
    return brew;
  }

  static fromRecord(fields: BrewFields, vocabulary?: BrewVocabulary): Brew {
    return Brew.create(fields, vocabulary);
  }

  get log(): readonly LogEntry[] {
    return this.entries;
  }

  addEvent(type: string, text: string): LogEntry {
    const entry: LogEntry = { time: isoNow(), type, text };
    this.entries.push(entry);
    return entry;
  }

  removeLogEntry(index: number): boolean {
    if (!Number.isInteger(index) || index < 0 || index >= this.entries.length) {
      return false;
    }
    this.entries.splice(index, 1);
    return true;
  }

  /** ABV, or undefined while either gravity is still unrecorded. */
  getAbv(): number | undefined {
    if (this.og && this.fg) {
      return calcAbv(this.og, this.fg);
    }
    return undefined;
  }

  applyDetails(details: BrewDetails): void {
    if (details.name !== undefined) this.name = details.name;
    if (details.category !== undefined) this.category = details.category;
    if (details.stage !== undefined) this.stage = details.stage;
    if (details.recipe !== undefined) this.recipe = details.recipe;
    if (details.notes !== undefined) this.notes = details.notes;
    if (details.volume !== undefined) this.volume = details.volume;
    if (details.og !== undefined) this.og = details.og;
    if (details.fg !== undefined) this.fg = details.fg;
    if (details.ph !== undefined) this.ph = details.ph;
    if (details.temp !== undefined) this.temp = details.temp;
  }

  toRecord(): BrewRecord {
    return {
      id: this.id,
      name: this.name,
      category: this.category,
      recipe: this.recipe,
      notes: this.notes,
      start_date: this.startDate,
      stage: this.stage,
      volume: this.volume,
      original_volume: this.originalVolume,
      og: this.og,
      fg: this.fg,
      ph: this.ph,
      temp: this.temp,
      log: this.entries.map((entry) => ({ ...entry })),
    };
  }
}
