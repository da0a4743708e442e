const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;

/** Parses decimal text. Empty or non-numeric text gives undefined, never 0. */
export function parseDecimal(text: string): number | undefined {
  const trimmed = text.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) return undefined;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : undefined;
}

export function validateFloat<F>(text: string, fallback: F): number | F {
  return parseDecimal(text) ?? fallback;
}

function toNumber(value: number | string): number | undefined {
  if (typeof value === "number") return Number.isFinite(value) ? value : undefined;
  return parseDecimal(value);
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Percent alcohol by volume from original and final specific gravity,
 * using the alcohol-by-weight formula scaled by FG / 0.794.
 */
export function calcAbv(og: number | string, fg: number | string): number {
  const o = toNumber(og);
  const f = toNumber(fg);
  if (o === undefined || f === undefined) return 0;
  if (o <= f) return 0;

  const denominator = 1.775 - o;
  if (denominator === 0) return 0;

  const abw = (76.08 * (o - f)) / denominator;
  const abv = abw * (f / 0.794);
  return Number.isFinite(abv) ? roundTo(abv, 2) : 0;
}
