/**
 * Tests for the exact decimal arithmetic.
 *
 * Covers:
 * - Parsing strings and numbers (including exponent notation)
 * - Null/absent values read as zero
 * - Formatting with a minimum number of places
 * - Arithmetic and comparison across different scales
 */

import { describe, it, expect } from "vitest";
import {
  parseDecimal,
  numberToDecimal,
  toDecimal,
  formatDecimal,
  decimalToNumber,
  rescale,
  addDecimal,
  subtractDecimal,
  multiplyDecimal,
  shiftDecimal,
  sumDecimals,
  compareDecimal,
  isZeroDecimal,
  isPositiveDecimal,
  zeroDecimal,
} from "../src/decimal.js";
import { EngineError } from "../src/types.js";
import { engineErrorCode } from "./helpers.js";

// ─── parseDecimal ────────────────────────────────────────────────────────

describe("parseDecimal", () => {
  it("parses a whole number", () => {
    expect(parseDecimal("1000")).toEqual({ units: 1000n, scale: 0 });
  });

  it("keeps the scale of the fractional part", () => {
    expect(parseDecimal("100.50")).toEqual({ units: 10050n, scale: 2 });
  });

  it("parses a negative number", () => {
    expect(parseDecimal("-50.25")).toEqual({ units: -5025n, scale: 2 });
  });

  it("trims surrounding whitespace", () => {
    expect(parseDecimal(" 7 ")).toEqual({ units: 7n, scale: 0 });
  });

  it("rejects malformed text", () => {
    for (const text of ["", "abc", "1.2.3", "+1", "1e5", ".5", "1,000"]) {
      expect(() => parseDecimal(text)).toThrow(EngineError);
    }
  });

  it("reports INVALID_DECIMAL", () => {
    expect(engineErrorCode(() => parseDecimal("ten"))).toBe("INVALID_DECIMAL");
  });
});

// ─── numberToDecimal ─────────────────────────────────────────────────────

describe("numberToDecimal", () => {
  it("reads a number through its shortest decimal text", () => {
    expect(numberToDecimal(100.05)).toEqual({ units: 10005n, scale: 2 });
  });

  it("handles small exponents", () => {
    expect(numberToDecimal(1e-7)).toEqual({ units: 1n, scale: 7 });
  });

  it("handles large exponents", () => {
    expect(numberToDecimal(1.5e21)).toEqual({
      units: 1_500_000_000_000_000_000_000n,
      scale: 0,
    });
  });

  it("rejects NaN and Infinity", () => {
    expect(() => numberToDecimal(Number.NaN)).toThrow(EngineError);
    expect(() => numberToDecimal(Number.POSITIVE_INFINITY)).toThrow(EngineError);
  });
});

// ─── toDecimal ───────────────────────────────────────────────────────────

describe("toDecimal", () => {
  it("reads null, undefined and blank as zero", () => {
    expect(toDecimal(null)).toEqual({ units: 0n, scale: 0 });
    expect(toDecimal(undefined)).toEqual({ units: 0n, scale: 0 });
    expect(toDecimal("  ")).toEqual({ units: 0n, scale: 0 });
  });

  it("reads strings and numbers alike", () => {
    expect(toDecimal("2.5")).toEqual(toDecimal(2.5));
  });
});

// ─── formatDecimal ───────────────────────────────────────────────────────

describe("formatDecimal", () => {
  it("formats with the value's own scale", () => {
    expect(formatDecimal({ units: 10050n, scale: 2 })).toBe("100.50");
  });

  it("pads to the minimum scale", () => {
    expect(formatDecimal({ units: 1090n, scale: 0 }, 2)).toBe("1090.00");
  });

  it("never drops digits beyond the minimum scale", () => {
    expect(formatDecimal({ units: 1090125n, scale: 3 }, 2)).toBe("1090.125");
  });

  it("formats sub-unit values", () => {
    expect(formatDecimal({ units: 5n, scale: 3 })).toBe("0.005");
  });

  it("formats negative sub-unit values", () => {
    expect(formatDecimal({ units: -5n, scale: 1 }, 2)).toBe("-0.50");
  });

  it("formats integers without a point", () => {
    expect(formatDecimal({ units: 42n, scale: 0 })).toBe("42");
  });
});

describe("decimalToNumber", () => {
  it("converts through the decimal text", () => {
    expect(decimalToNumber({ units: 450n, scale: 2 })).toBe(4.5);
  });
});

// ─── Arithmetic ──────────────────────────────────────────────────────────

describe("arithmetic", () => {
  it("adds across scales", () => {
    expect(addDecimal(parseDecimal("1.5"), parseDecimal("2.25"))).toEqual({
      units: 375n,
      scale: 2,
    });
  });

  it("subtracts into negatives", () => {
    expect(subtractDecimal(parseDecimal("1"), parseDecimal("2.5"))).toEqual({
      units: -15n,
      scale: 1,
    });
  });

  it("multiplies exactly", () => {
    expect(multiplyDecimal(parseDecimal("100.05"), parseDecimal("2.5"))).toEqual({
      units: 250125n,
      scale: 3,
    });
  });

  it("shifts the decimal point left", () => {
    expect(formatDecimal(shiftDecimal(parseDecimal("250.125"), 2))).toBe("2.50125");
  });

  it("sums a list, the empty sum being zero", () => {
    expect(sumDecimals([])).toEqual({ units: 0n, scale: 0 });
    expect(
      formatDecimal(sumDecimals([parseDecimal("0.13"), parseDecimal("0.13"), parseDecimal("0.13")])),
    ).toBe("0.39");
  });

  it("rescales upward only", () => {
    expect(rescale(parseDecimal("1.5"), 3)).toEqual({ units: 1500n, scale: 3 });
    expect(() => rescale(parseDecimal("1.55"), 1)).toThrow(RangeError);
  });
});

// ─── Comparison ──────────────────────────────────────────────────────────

describe("comparison", () => {
  it("compares values of different scale", () => {
    expect(compareDecimal(parseDecimal("1.50"), parseDecimal("1.5"))).toBe(0);
    expect(compareDecimal(parseDecimal("1.49"), parseDecimal("1.5"))).toBe(-1);
    expect(compareDecimal(parseDecimal("2"), parseDecimal("1.99"))).toBe(1);
  });

  it("detects zero and positive values", () => {
    expect(isZeroDecimal(parseDecimal("0.00"))).toBe(true);
    expect(isPositiveDecimal(parseDecimal("0.01"))).toBe(true);
    expect(isPositiveDecimal(parseDecimal("0"))).toBe(false);
    expect(isPositiveDecimal(parseDecimal("-1"))).toBe(false);
  });

  it("creates zero at a given scale", () => {
    expect(formatDecimal(zeroDecimal(2))).toBe("0.00");
  });
});
