import { parseIso } from "../utils/time.js";
import { roundTo } from "./gravity.js";
import type { Brew } from "./brew.js";
import type { GravityLabel, GravityPoint, LogEntry, TemperaturePoint } from "./types.js";

const GRAVITY_EVENT = "Gravity Reading";
const TEMP_EVENT = "Temp Check";

const GRAVITY_MIN = 0.99;
const GRAVITY_MAX = 1.2;
const TEMP_MIN = -5;
const TEMP_MAX = 100;

// "1.052", "0.998"
const DECIMAL_GRAVITY = /\d\.\d{2,}/;
// "1050", "0998", "995" as a bare number -> points, divided by 1000
const POINTS_GRAVITY = /\b([01]?\d{3})\b/;
// "18.5 C", "64°F", "-2.5 °c"
const TEMPERATURE = /(-?\d+(?:\.\d+)?)\s*°?\s*[CF](?![a-z])/i;

function isGravityCandidate(entry: LogEntry): boolean {
  if (entry.type === GRAVITY_EVENT) return true;
  const text = entry.text.toLowerCase();
  return text.includes("gravity") || text.includes("og") || text.includes("fg");
}

function readGravity(text: string): number | undefined {
  const decimal = DECIMAL_GRAVITY.exec(text);
  if (decimal) return Number(decimal[0]);

  const points = POINTS_GRAVITY.exec(text);
  if (points?.[1]) return Number(points[1]) / 1000;

  return undefined;
}

function gravityLabel(text: string): GravityLabel {
  const lower = text.toLowerCase();
  if (lower.includes("fg")) return "FG";
  if (lower.includes("og")) return "OG";
  return "Reading";
}

function byTime<P extends { time: Date }>(points: P[]): P[] {
  // Array.prototype.sort is stable, so equal timestamps keep log order.
  return points.sort((a, b) => a.time.getTime() - b.time.getTime());
}

/**
 * Gravity readings mined from the log, oldest first. The brew's OG seeds the
 * series at its start date; readings outside 0.990–1.200 are treated as noise.
 */
export function extractGravitySeries(brew: Brew): GravityPoint[] {
  const points: GravityPoint[] = [];

  if (brew.og > 0) {
    const start = parseIso(brew.startDate);
    if (start) points.push({ time: start, value: brew.og, label: "OG" });
  }

  for (const entry of brew.log) {
    if (!isGravityCandidate(entry)) continue;

    const value = readGravity(entry.text);
    if (value === undefined || value < GRAVITY_MIN || value > GRAVITY_MAX) continue;

    const time = parseIso(entry.time);
    if (!time) continue;

    points.push({ time, value, label: gravityLabel(entry.text) });
  }

  return byTime(points);
}

export function extractTemperatureSeries(brew: Brew): TemperaturePoint[] {
  const points: TemperaturePoint[] = [];

  for (const entry of brew.log) {
    if (entry.type !== TEMP_EVENT && !entry.text.toLowerCase().includes("temp")) continue;

    const match = TEMPERATURE.exec(entry.text);
    if (!match?.[1]) continue;

    const value = Number(match[1]);
    if (!Number.isFinite(value) || value < TEMP_MIN || value > TEMP_MAX) continue;

    const time = parseIso(entry.time);
    if (!time) continue;

    points.push({ time, value: roundTo(value, 2) });
  }

  return byTime(points);
}
