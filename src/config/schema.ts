import { z } from "zod";
import type { FermtrackConfig } from "./types.js";

export const DEFAULT_CATEGORIES = ["Beer", "Wine", "Mead", "Cider", "Kombucha", "Seltzer"];

export const DEFAULT_STAGES = [
  "Primary",
  "Secondary",
  "Aging",
  "Cold Crash",
  "Bottled",
  "Kegged",
];

export const DEFAULT_EVENT_TYPES = [
  "General",
  "Gravity Reading",
  "Nutrient Addition",
  "pH Reading",
  "Temp Check",
  "Aeration",
  "Dry Hop",
  "Fruit Addition",
  "Fruit Removal",
  "Brew Stage Change",
];

const slotsSchema = z.object({
  defaultCount: z.number().int().min(0).default(5),
});

const vocabularySchema = z.object({
  categories: z.array(z.string()).default(DEFAULT_CATEGORIES),
  stages: z.array(z.string()).default(DEFAULT_STAGES),
  eventTypes: z.array(z.string()).default(DEFAULT_EVENT_TYPES),
});

const displaySchema = z.object({
  timezone: z.string().min(1).default("America/New_York"),
  datePattern: z.string().min(1).default("%Y-%m-%d %H:%M"),
});

const storageSchema = z.object({
  stateFile: z.string().min(1).default("brews.json"),
  historyFile: z.string().min(1).default("brew_history.json"),
});

const loggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error", "silent"]).default("warn"),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

export const fermtrackConfigSchema = z.object({
  slots: slotsSchema.default({}),
  vocabulary: vocabularySchema.default({}),
  display: displaySchema.default({}),
  storage: storageSchema.default({}),
  logging: loggingSchema.default({}),
});

export function parseConfig(raw: unknown): FermtrackConfig {
  return fermtrackConfigSchema.parse(raw);
}
