/**
 * @gst-recalc/engine — Half-up rounding primitives.
 *
 * Both rules follow the accounting package the results must match:
 * a value exactly at the midpoint rounds up. They are magnitude-only
 * rules built on truncation toward zero; for negative inputs they are
 * not symmetric (the domain has no negative tax amounts).
 */

import type { DecimalInput } from "@gst-recalc/types";
import { formatDecimal, rescale, toDecimal } from "./decimal.js";
import type { Decimal } from "./types.js";

function pow10(exponent: number): bigint {
  return 10n ** BigInt(exponent);
}

/**
 * trunc(x × 10^places + 0.5) / 10^places, computed exactly.
 *
 * roundHalfUp(10.125, 2) → 10.13
 * roundHalfUp(10.124, 2) → 10.12
 */
export function roundHalfUp(value: Decimal, places: number): Decimal {
  if (value.scale <= places && value.units >= 0n) {
    return rescale(value, places);
  }

  // One extra digit is enough to hold the added half.
  const scale = Math.max(value.scale - places, 0) + 1;
  const shifted = rescale(value, places + scale).units;
  const half = 5n * pow10(scale - 1);

  // bigint division truncates toward zero.
  return { units: (shifted + half) / pow10(scale), scale: places };
}

/**
 * f = x − trunc(x); f ≥ 0.5 → trunc(x) + 1, else trunc(x).
 *
 * roundHalfUpToInteger(10.5) → 11
 * roundHalfUpToInteger(10.4) → 10
 */
export function roundHalfUpToInteger(value: Decimal): Decimal {
  const unit = pow10(value.scale);
  const whole = value.units / unit;
  const fraction = value.units - whole * unit;

  return { units: fraction * 2n >= unit ? whole + 1n : whole, scale: 0 };
}

/**
 * String convenience over {@link roundHalfUp}.
 */
export function roundHalfUpText(input: DecimalInput, places = 2): string {
  return formatDecimal(roundHalfUp(toDecimal(input), places), places);
}

/**
 * String convenience over {@link roundHalfUpToInteger}.
 */
export function roundHalfUpToIntegerText(input: DecimalInput): string {
  return formatDecimal(roundHalfUpToInteger(toDecimal(input)));
}
