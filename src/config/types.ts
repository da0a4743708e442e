export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface FermtrackConfig {
  readonly slots: SlotsConfig;
  readonly vocabulary: VocabularyConfig;
  readonly display: DisplayConfig;
  readonly storage: StorageConfig;
  readonly logging: LoggingConfig;
}

export interface SlotsConfig {
  readonly defaultCount: number;
}

export interface VocabularyConfig {
  readonly categories: readonly string[];
  readonly stages: readonly string[];
  readonly eventTypes: readonly string[];
}

export interface DisplayConfig {
  readonly timezone: string; // IANA timezone
  readonly datePattern: string; // strftime subset: %Y %m %d %H %M %S
}

export interface StorageConfig {
  readonly stateFile: string;
  readonly historyFile: string;
}

export interface LoggingConfig {
  readonly level?: LogLevel;
  readonly file?: string;
  readonly json?: boolean;
}
