import { describe, it, expect } from "vitest";
import { calcAbv, parseDecimal, roundTo, validateFloat } from "../../src/brew/gravity.js";

describe("calcAbv", () => {
  it("computes ABV rounded to two decimals", () => {
    expect(calcAbv(1.05, 1.01)).toBe(5.34);
    expect(calcAbv(1.06, 1.012)).toBe(6.51);
    expect(calcAbv(1.1, 1.0)).toBe(14.2);
  });

  it("accepts decimal strings", () => {
    expect(calcAbv("1.050", " 1.010 ")).toBe(5.34);
  });

  it("returns 0 when og does not exceed fg", () => {
    expect(calcAbv(1.01, 1.01)).toBe(0);
    expect(calcAbv(1.0, 1.01)).toBe(0);
  });

  it("returns 0 when og sits on the formula's pole", () => {
    expect(calcAbv(1.775, 1.0)).toBe(0);
  });

  it("returns 0 for non-numeric input", () => {
    expect(calcAbv("abc", 1.01)).toBe(0);
    expect(calcAbv(1.05, "")).toBe(0);
    expect(calcAbv(Number.NaN, 1.0)).toBe(0);
  });

  it("is non-negative and deterministic for og > fg", () => {
    const pairs: Array<[number, number]> = [
      [1.04, 1.0],
      [1.09, 1.015],
      [1.12, 0.995],
    ];
    for (const [og, fg] of pairs) {
      const first = calcAbv(og, fg);
      expect(first).toBeGreaterThanOrEqual(0);
      expect(calcAbv(og, fg)).toBe(first);
    }
  });
});

describe("parseDecimal", () => {
  it("parses signed and fractional values", () => {
    expect(parseDecimal("1.050")).toBe(1.05);
    expect(parseDecimal("-2.5")).toBe(-2.5);
    expect(parseDecimal(".5")).toBe(0.5);
    expect(parseDecimal("20")).toBe(20);
    expect(parseDecimal("1e3")).toBe(1000);
    expect(parseDecimal("  0 ")).toBe(0);
  });

  it("rejects empty and non-numeric text", () => {
    expect(parseDecimal("")).toBeUndefined();
    expect(parseDecimal("   ")).toBeUndefined();
    expect(parseDecimal("1.0.5")).toBeUndefined();
    expect(parseDecimal("12L")).toBeUndefined();
    expect(parseDecimal("abc")).toBeUndefined();
  });
});

describe("validateFloat", () => {
  it("distinguishes a parsed zero from a failure", () => {
    const INVALID = Symbol("invalid");
    expect(validateFloat("0", INVALID)).toBe(0);
    expect(validateFloat("zero", INVALID)).toBe(INVALID);
    expect(validateFloat("oops", undefined)).toBeUndefined();
  });
});

describe("roundTo", () => {
  it("rounds to the given number of decimals", () => {
    expect(roundTo(23 - 0.333, 2)).toBe(22.67);
    expect(roundTo(19.99 - 0.37, 2)).toBe(19.62);
  });
});
