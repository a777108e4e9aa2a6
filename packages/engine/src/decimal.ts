/**
 * @gst-recalc/engine — Exact decimal arithmetic.
 *
 * All arithmetic uses bigint internally for precision.
 * Host values are converted to/from scaled bigints via their
 * decimal text, so 100.05 is exactly 10005 / 10^2.
 *
 * Rules:
 * - No floating-point operations
 * - Amounts must be valid decimal strings or finite numbers
 * - Zero runtime dependencies
 */

import type { DecimalInput } from "@gst-recalc/types";
import { EngineError } from "./types.js";
import type { Decimal } from "./types.js";

const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;
const EXPONENT_PATTERN = /^(-?\d+(?:\.\d+)?)e([+-]?\d+)$/i;

function pow10(exponent: number): bigint {
  return 10n ** BigInt(exponent);
}

// ─── Conversion ──────────────────────────────────────────────────────────

/**
 * Parse a decimal string. The scale is the number of fractional digits.
 *
 * "100.50" → { units: 10050n, scale: 2 }
 * "-50"    → { units: -50n, scale: 0 }
 */
export function parseDecimal(text: string): Decimal {
  const trimmed = text.trim();

  if (!DECIMAL_PATTERN.test(trimmed)) {
    throw new EngineError("INVALID_DECIMAL", `Invalid decimal: "${text}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const [intPart = "0", fracPart = ""] = abs.split(".");
  const value = BigInt(intPart + fracPart);

  return { units: negative ? -value : value, scale: fracPart.length };
}

/**
 * Convert a finite number through its shortest decimal representation.
 *
 * 100.05 → "100.05" → { units: 10005n, scale: 2 }
 * 1e-7   → { units: 1n, scale: 7 }
 */
export function numberToDecimal(value: number): Decimal {
  if (!Number.isFinite(value)) {
    throw new EngineError("INVALID_DECIMAL", `Invalid decimal: ${String(value)}`);
  }

  const text = String(value);
  const match = EXPONENT_PATTERN.exec(text);
  if (match === null) {
    return parseDecimal(text);
  }

  const mantissa = parseDecimal(match[1] ?? "0");
  const exponent = Number(match[2]);
  if (exponent >= 0) {
    return mantissa.scale >= exponent
      ? { units: mantissa.units, scale: mantissa.scale - exponent }
      : { units: mantissa.units * pow10(exponent - mantissa.scale), scale: 0 };
  }
  return { units: mantissa.units, scale: mantissa.scale - exponent };
}

/**
 * Read a host value. `null`, `undefined` and "" are zero.
 */
export function toDecimal(input: DecimalInput): Decimal {
  if (input === null || input === undefined) {
    return zeroDecimal();
  }
  if (typeof input === "number") {
    return numberToDecimal(input);
  }
  if (input.trim() === "") {
    return zeroDecimal();
  }
  return parseDecimal(input);
}

/**
 * Format a decimal with at least `minScale` fractional digits.
 *
 * ({ units: 10050n, scale: 2 }, 2) → "100.50"
 * ({ units: 1090n, scale: 0 }, 2)  → "1090.00"
 * ({ units: -5n, scale: 1 }, 2)    → "-0.50"
 */
export function formatDecimal(value: Decimal, minScale = 0): string {
  const { units, scale } = rescale(value, Math.max(value.scale, minScale));

  if (scale === 0) {
    return units.toString();
  }

  const negative = units < 0n;
  const abs = negative ? -units : units;
  const str = abs.toString().padStart(scale + 1, "0");
  const result = `${str.slice(0, str.length - scale)}.${str.slice(str.length - scale)}`;

  return negative ? `-${result}` : result;
}

/**
 * Convert to a JavaScript number, for JSON payloads only.
 */
export function decimalToNumber(value: Decimal): number {
  return Number(formatDecimal(value));
}

// ─── Arithmetic ──────────────────────────────────────────────────────────

/**
 * Express a decimal with a larger scale. Never loses digits.
 */
export function rescale(value: Decimal, scale: number): Decimal {
  if (scale < value.scale) {
    throw new RangeError(`Cannot rescale from ${String(value.scale)} down to ${String(scale)}`);
  }
  return { units: value.units * pow10(scale - value.scale), scale };
}

function align(a: Decimal, b: Decimal): [bigint, bigint, number] {
  const scale = Math.max(a.scale, b.scale);
  return [rescale(a, scale).units, rescale(b, scale).units, scale];
}

export function addDecimal(a: Decimal, b: Decimal): Decimal {
  const [ua, ub, scale] = align(a, b);
  return { units: ua + ub, scale };
}

export function subtractDecimal(a: Decimal, b: Decimal): Decimal {
  const [ua, ub, scale] = align(a, b);
  return { units: ua - ub, scale };
}

export function multiplyDecimal(a: Decimal, b: Decimal): Decimal {
  return { units: a.units * b.units, scale: a.scale + b.scale };
}

/**
 * Divide by 10^places exactly (moves the decimal point left).
 * Percentages: shiftDecimal(x, 2) is x / 100.
 */
export function shiftDecimal(value: Decimal, places: number): Decimal {
  return { units: value.units, scale: value.scale + places };
}

/**
 * Sum a list of decimals. The empty sum is zero.
 */
export function sumDecimals(values: Iterable<Decimal>): Decimal {
  let total = zeroDecimal();
  for (const value of values) {
    total = addDecimal(total, value);
  }
  return total;
}

// ─── Comparison ──────────────────────────────────────────────────────────

/**
 * Compare two decimals. Returns -1, 0, or 1.
 */
export function compareDecimal(a: Decimal, b: Decimal): -1 | 0 | 1 {
  const [ua, ub] = align(a, b);
  if (ua < ub) return -1;
  if (ua > ub) return 1;
  return 0;
}

export function isZeroDecimal(value: Decimal): boolean {
  return value.units === 0n;
}

export function isPositiveDecimal(value: Decimal): boolean {
  return value.units > 0n;
}

export function zeroDecimal(scale = 0): Decimal {
  return { units: 0n, scale };
}
