import type { DisplayConfig } from "../config/types.js";

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d+))?)?)?(Z|[+-]\d{2}:?\d{2})?$/i;

const MS_PER_MINUTE = 60_000;

export function nowUtc(): Date {
  return new Date();
}

export function isoNow(): string {
  return nowUtc().toISOString();
}

function offsetMinutes(zone: string | undefined): number {
  if (!zone || zone.toUpperCase() === "Z") return 0;
  const sign = zone.startsWith("-") ? -1 : 1;
  const digits = zone.slice(1).replace(":", "");
  const hours = Number(digits.slice(0, 2));
  const minutes = Number(digits.slice(2, 4));
  return sign * (hours * 60 + minutes);
}

/**
 * Parses an ISO-8601 timestamp. A timestamp without an offset is taken as UTC,
 * never as local time. Returns undefined for anything malformed.
 */
export function parseIso(value: string | null | undefined): Date | undefined {
  if (!value) return undefined;
  const match = ISO_PATTERN.exec(value.trim());
  if (!match) return undefined;

  const [, y, mo, d, h = "0", mi = "0", s = "0", fraction = "", zone] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);
  const millis = Number(fraction.slice(0, 3).padEnd(3, "0"));

  const utc = new Date(Date.UTC(year, month - 1, day, hour, minute, second, millis));
  // Date.UTC rolls over out-of-range fields; reject instead.
  if (
    utc.getUTCFullYear() !== year ||
    utc.getUTCMonth() !== month - 1 ||
    utc.getUTCDate() !== day ||
    utc.getUTCHours() !== hour ||
    utc.getUTCMinutes() !== minute ||
    utc.getUTCSeconds() !== second
  ) {
    return undefined;
  }

  return new Date(utc.getTime() - offsetMinutes(zone) * MS_PER_MINUTE);
}

function toDate(value: Date | string | null | undefined): Date | undefined {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? undefined : value;
  }
  return parseIso(value);
}

function zonedParts(date: Date, timezone: string): Record<string, string> {
  const options: Intl.DateTimeFormatOptions = {
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hourCycle: "h23",
  };

  let fmt: Intl.DateTimeFormat;
  try {
    fmt = new Intl.DateTimeFormat("en-US", { ...options, timeZone: timezone });
  } catch {
    // Unknown timezone: fall back to UTC
    fmt = new Intl.DateTimeFormat("en-US", { ...options, timeZone: "UTC" });
  }

  const parts: Record<string, string> = {};
  for (const part of fmt.formatToParts(date)) {
    parts[part.type] = part.value;
  }
  return parts;
}

/** Renders an instant in the configured display zone, or "-" when there is nothing to show. */
export function formatLocal(
  value: Date | string | null | undefined,
  display: DisplayConfig,
): string {
  const date = toDate(value);
  if (!date) return "-";

  const parts = zonedParts(date, display.timezone);
  const tokens: Record<string, string> = {
    Y: parts["year"] ?? "",
    m: parts["month"] ?? "",
    d: parts["day"] ?? "",
    H: parts["hour"] ?? "",
    M: parts["minute"] ?? "",
    S: parts["second"] ?? "",
    "%": "%",
  };

  return display.datePattern.replace(/%([YmdHMS%])/g, (match, token: string) => tokens[token] ?? match);
}

export function humanElapsed(
  since: Date | string | null | undefined,
  now: Date = nowUtc(),
): string {
  const start = toDate(since);
  if (!start) return "-";

  const totalMinutes = Math.max(0, Math.floor((now.getTime() - start.getTime()) / MS_PER_MINUTE));
  const days = Math.floor(totalMinutes / 1440);
  const hours = Math.floor((totalMinutes % 1440) / 60);
  const minutes = totalMinutes % 60;
  return `${days}d, ${hours}h, ${minutes}m`;
}
