export interface LogEntry {
  readonly time: string; // ISO-8601 UTC
  readonly type: string;
  readonly text: string;
}

/** Flat, persisted shape of a brew. Keys match the state and history files. */
export interface BrewRecord {
  readonly id: string;
  readonly name: string;
  readonly category: string;
  readonly recipe: string;
  readonly notes: string;
  readonly start_date: string;
  readonly stage: string;
  readonly volume: number;
  readonly original_volume: number;
  readonly og: number;
  readonly fg: number;
  readonly ph: number;
  readonly temp: number;
  readonly log: readonly LogEntry[];
}

export type BrewFields = Partial<BrewRecord>;

export interface ArchiveRecord extends BrewRecord {
  readonly archived_from: string;
}

export interface BrewVocabulary {
  readonly categories: readonly string[];
  readonly stages: readonly string[];
}

/** Detail fields an existing brew accepts after validation. */
export interface BrewDetails {
  readonly name?: string;
  readonly category?: string;
  readonly stage?: string;
  readonly recipe?: string;
  readonly notes?: string;
  readonly volume?: number;
  readonly og?: number;
  readonly fg?: number;
  readonly ph?: number;
  readonly temp?: number;
}

export type GravityLabel = "OG" | "FG" | "Reading";

export interface GravityPoint {
  readonly time: Date;
  readonly value: number;
  readonly label: GravityLabel;
}

export interface TemperaturePoint {
  readonly time: Date;
  readonly value: number;
}
