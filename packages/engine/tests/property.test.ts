/**
 * Property-Based Tests for @gst-recalc/engine
 *
 * Uses fast-check to verify invariants that must hold for ANY valid invoice:
 *
 * 1. Document tax equals the sum of per-item rounded amounts
 * 2. Each item amount is within half a unit of the last place of the exact product
 * 3. Rerunning on the output changes nothing
 * 4. The rounding adjustment is below one unit and the rounded total is integral
 * 5. The two-row chain adds exactly the second row's own amount
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import type { InvoiceSnapshot, LineItem } from "@gst-recalc/types";
import { recalculate } from "../src/recalculate.js";
import {
  addDecimal,
  compareDecimal,
  formatDecimal,
  multiplyDecimal,
  parseDecimal,
  shiftDecimal,
  subtractDecimal,
  sumDecimals,
  toDecimal,
} from "../src/decimal.js";
import type { Decimal } from "../src/types.js";

// =============================================================================
// Arbitraries
// =============================================================================

/** GST slab rates, as percentages, including halves used for CGST/SGST. */
const arbRate = fc.constantFrom("0", "0.125", "1.5", "2.5", "3", "6", "9", "14", "18", "28");

/** A currency amount with two places, up to 10^9 units. */
const arbAmount = fc
  .bigInt({ min: 0n, max: 100_000_000_000n })
  .map((paise) => formatDecimal({ units: paise, scale: 2 }));

const arbItem: fc.Arbitrary<LineItem> = fc.record({
  itemCode: fc.stringMatching(/^[A-Z]{2}-\d{1,3}$/),
  amount: arbAmount,
  cgstRate: arbRate,
  sgstRate: arbRate,
  igstRate: arbRate,
});

const arbInvoice: fc.Arbitrary<InvoiceSnapshot> = fc
  .tuple(
    fc.array(arbItem, { minLength: 0, maxLength: 12 }),
    fc.constantFrom(
      [{ gstTaxType: "IGST" }],
      [{ gstTaxType: "CGST" }, { gstTaxType: "SGST" }],
      [{ gstTaxType: "CGST" }, { gstTaxType: "SGST" }, { accountHead: "Freight" }],
    ),
  )
  .map(([items, taxes]) => {
    const net = formatDecimal(sumDecimals(items.map((item) => toDecimal(item.amount))), 2);
    return { docstatus: 0 as const, netTotal: net, baseTotal: net, items, taxes };
  });

const HALF_PAISA = parseDecimal("0.005");

function abs(value: Decimal): Decimal {
  return value.units < 0n ? { units: -value.units, scale: value.scale } : value;
}

// =============================================================================
// Properties
// =============================================================================

describe("recalculate properties", () => {
  it("document tax is the sum of rounded item amounts", () => {
    fc.assert(
      fc.property(arbInvoice, (input) => {
        const result = recalculate(input);
        const itemSum = sumDecimals(
          result.items.flatMap((item) => [
            toDecimal(item.cgstAmount),
            toDecimal(item.sgstAmount),
            toDecimal(item.igstAmount),
          ]),
        );
        expect(compareDecimal(toDecimal(result.totalTaxesAndCharges), itemSum)).toBe(0);
      }),
    );
  });

  it("each item amount is within half a paisa of the exact product", () => {
    fc.assert(
      fc.property(arbItem, (item) => {
        const [result] = recalculate({ items: [item], taxes: [] }).items;
        const exact = shiftDecimal(multiplyDecimal(toDecimal(item.amount), toDecimal(item.cgstRate)), 2);
        const diff = abs(subtractDecimal(toDecimal(result?.cgstAmount), exact));
        expect(compareDecimal(diff, HALF_PAISA)).toBeLessThanOrEqual(0);
      }),
    );
  });

  it("rerunning on the output changes nothing", () => {
    fc.assert(
      fc.property(arbInvoice, (input) => {
        const once = recalculate(input);
        expect(recalculate(once)).toEqual(once);
      }),
    );
  });

  it("rounding adjustment stays below one unit and the rounded total is integral", () => {
    fc.assert(
      fc.property(arbInvoice, (input) => {
        const result = recalculate(input);
        const adjustment = toDecimal(result.roundingAdjustment);
        expect(compareDecimal(abs(adjustment), parseDecimal("1"))).toBe(-1);
        expect(String(result.baseRoundedTotal)).toMatch(/^\d+\.00$/);
        expect(
          compareDecimal(
            addDecimal(toDecimal(result.baseGrandTotal), adjustment),
            toDecimal(result.baseRoundedTotal),
          ),
        ).toBe(0);
      }),
    );
  });

  it("the second row's total is the first row's plus its own amount", () => {
    fc.assert(
      fc.property(arbInvoice, (input) => {
        fc.pre(input.taxes.length === 2);
        const [first, second] = recalculate(input).taxes;
        const chained = addDecimal(toDecimal(first?.total), toDecimal(second?.taxAmount));
        expect(compareDecimal(toDecimal(second?.total), chained)).toBe(0);
      }),
    );
  });
});
