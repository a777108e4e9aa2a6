/**
 * @gst-recalc/engine — Invoice tax recalculation.
 *
 * Runs after the host's standard tax pass and replaces its figures with
 * ones that follow the target accounting package's conventions:
 *
 * 1. Every item's tax is rounded half-up on its own, per tax kind
 * 2. Row totals are sums of those rounded amounts (never re-rounded)
 * 3. Grand totals round half-up to whole units
 *
 * Pure: the input snapshot is not touched; a new one is returned.
 */

import type {
  InvoiceSnapshot,
  LineItem,
  TaxRow,
} from "@gst-recalc/types";
import {
  addDecimal,
  decimalToNumber,
  formatDecimal,
  isPositiveDecimal,
  multiplyDecimal,
  shiftDecimal,
  subtractDecimal,
  sumDecimals,
  toDecimal,
  zeroDecimal,
} from "./decimal.js";
import { roundHalfUp, roundHalfUpToInteger } from "./rounding.js";
import { classifyTaxLabel, taxRowLabel } from "./classify.js";
import { TaxBreakup } from "./breakup.js";
import {
  DEFAULT_PRECISION,
  EngineError,
  MAX_PRECISION,
  RECOGNIZED_TAX_KINDS,
} from "./types.js";
import type {
  Decimal,
  RecalculateOptions,
  RecalculationResult,
  RecognizedTaxKind,
  RowClassification,
} from "./types.js";

type KindMap<T> = Record<RecognizedTaxKind, T>;

/** Line item fields read and written for each tax kind. */
const ITEM_FIELDS = {
  central: { rate: "cgstRate", amount: "cgstAmount" },
  state: { rate: "sgstRate", amount: "sgstAmount" },
  integrated: { rate: "igstRate", amount: "igstAmount" },
} as const satisfies KindMap<{ rate: keyof LineItem; amount: keyof LineItem }>;

function resolvePrecision(precision: number | undefined): number {
  const value = precision ?? DEFAULT_PRECISION;
  if (!Number.isInteger(value) || value < 0 || value > MAX_PRECISION) {
    throw new EngineError(
      "INVALID_PRECISION",
      `Precision must be an integer between 0 and ${String(MAX_PRECISION)}, got: ${String(precision)}`,
    );
  }
  return value;
}

function kindMap<T>(make: (kind: RecognizedTaxKind) => T): KindMap<T> {
  return {
    central: make("central"),
    state: make("state"),
    integrated: make("integrated"),
  };
}

/**
 * amount × rate / 100, rounded half-up to `precision` places.
 */
export function computeItemTax(amount: Decimal, rate: Decimal, precision: number): Decimal {
  return roundHalfUp(shiftDecimal(multiplyDecimal(amount, rate), 2), precision);
}

/**
 * Recalculate and return the figures behind the result.
 *
 * @throws {EngineError} INVALID_DECIMAL for a malformed numeric string,
 *   INVALID_PRECISION for an out-of-range precision
 */
export function recalculateWithSummary(
  snapshot: InvoiceSnapshot,
  options: RecalculateOptions = {},
): RecalculationResult {
  const precision = resolvePrecision(options.precision);
  const format = (value: Decimal): string => formatDecimal(value, precision);

  const breakups = kindMap(() => new TaxBreakup());
  const itemTaxes: KindMap<Decimal[]> = kindMap(() => []);

  // ─── Items ──────────────────────────────────────────────────────
  const items = snapshot.items.map((item): LineItem => {
    const amount = toDecimal(item.amount);
    const written: Partial<Record<"cgstAmount" | "sgstAmount" | "igstAmount", string>> = {};

    for (const kind of RECOGNIZED_TAX_KINDS) {
      const fields = ITEM_FIELDS[kind];
      const rate = toDecimal(item[fields.rate]);
      const tax = computeItemTax(amount, rate, precision);

      written[fields.amount] = format(tax);
      itemTaxes[kind].push(tax);

      if (isPositiveDecimal(rate)) {
        breakups[kind].record(item.itemCode, decimalToNumber(rate), decimalToNumber(tax));
      }
    }

    return { ...item, ...written };
  });

  // ─── Totals ─────────────────────────────────────────────────────
  const totals = kindMap((kind) => addDecimal(zeroDecimal(precision), sumDecimals(itemTaxes[kind])));
  const totalTaxAmount = sumDecimals(RECOGNIZED_TAX_KINDS.map((kind) => totals[kind]));

  const baseTotal = toDecimal(snapshot.baseTotal);
  const grandTotal = addDecimal(toDecimal(snapshot.netTotal), totalTaxAmount);
  const baseGrandTotal = addDecimal(baseTotal, totalTaxAmount);
  const baseRoundedTotal = roundHalfUpToInteger(baseGrandTotal);
  const roundingAdjustment = subtractDecimal(baseRoundedTotal, baseGrandTotal);

  // ─── Tax rows ───────────────────────────────────────────────────
  // Running totals only exist for the one-row (interstate) and two-row
  // (intrastate) layouts. The chain follows row order and each row's own
  // classified amount, so it always agrees with the row's tax amount.
  const chained = snapshot.taxes.length === 1 || snapshot.taxes.length === 2;
  const rows: RowClassification[] = [];
  let running = baseTotal;

  const taxes = snapshot.taxes.map((row, index): TaxRow => {
    const label = taxRowLabel(row);
    const kind = classifyTaxLabel(label);
    rows.push({ index, kind, label });

    if (kind === "unrecognized") {
      return row;
    }

    const amount = format(totals[kind]);
    const updated: TaxRow = {
      ...row,
      taxAmount: amount,
      baseTaxAmount: amount,
      taxAmountAfterDiscountAmount: amount,
      baseTaxAmountAfterDiscountAmount: amount,
      itemWiseTaxDetail: breakups[kind].serialize(),
    };

    if (!chained) {
      return updated;
    }

    running = addDecimal(running, totals[kind]);
    const total = format(running);
    return { ...updated, total, baseTotal: total };
  });

  const invoice: InvoiceSnapshot = {
    ...snapshot,
    items,
    taxes,
    totalTaxesAndCharges: format(totalTaxAmount),
    baseTotalTaxesAndCharges: format(totalTaxAmount),
    grandTotal: format(grandTotal),
    baseGrandTotal: format(baseGrandTotal),
    roundingAdjustment: format(roundingAdjustment),
    roundedTotal: format(roundHalfUpToInteger(grandTotal)),
    baseRoundedTotal: format(baseRoundedTotal),
    outstandingAmount: format(baseRoundedTotal),
  };

  return {
    invoice,
    summary: {
      precision,
      totalCgst: format(totals.central),
      totalSgst: format(totals.state),
      totalIgst: format(totals.integrated),
      totalTaxAmount: format(totalTaxAmount),
      rows,
      breakup: kindMap((kind) => breakups[kind].entries()),
    },
  };
}

/**
 * Recalculate item taxes, tax rows and document totals.
 *
 * Missing numbers count as zero. Rows that are not CGST, SGST/UTGST or
 * IGST are passed through unchanged.
 */
export function recalculate(
  snapshot: InvoiceSnapshot,
  options: RecalculateOptions = {},
): InvoiceSnapshot {
  return recalculateWithSummary(snapshot, options).invoice;
}
