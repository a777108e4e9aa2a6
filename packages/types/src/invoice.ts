/**
 * Invoice Snapshot Types
 *
 * The in-memory contract exchanged with the host accounting framework.
 * The host's standard tax pass fills the inputs; the recalculation engine
 * returns a copy with the output fields written.
 *
 * Rules:
 * - Output amounts are decimal strings (no IEEE 754 drift)
 * - Numeric inputs may arrive as numbers or strings; null/absent means zero
 * - Rows and items are never added or removed by the engine
 */

/**
 * A numeric value as supplied by the host.
 * `null` and `undefined` are read as zero.
 */
export type DecimalInput = string | number | null | undefined;

/**
 * Document lifecycle status.
 * 0 = draft, 1 = submitted, 2 = cancelled.
 */
export type DocStatus = 0 | 1 | 2;

/**
 * Tax component a row belongs to, derived from its label.
 */
export type TaxKind = "central" | "state" | "integrated" | "unrecognized";

/**
 * A line item of the invoice.
 * Rates are percentages; the `*Amount` fields are written by the engine.
 */
export interface LineItem {
  /** Item code, used as the key of the item-wise breakup */
  readonly itemCode: string;

  /** Net amount of the line (qty × rate after discounts) */
  readonly amount?: DecimalInput;

  readonly cgstRate?: DecimalInput;
  readonly sgstRate?: DecimalInput;
  readonly igstRate?: DecimalInput;

  readonly cgstAmount?: DecimalInput;
  readonly sgstAmount?: DecimalInput;
  readonly igstAmount?: DecimalInput;
}

/**
 * A tax row (one per tax component).
 *
 * `gstTaxType` is the preferred classifier label; `accountHead`
 * is used when the tag is absent or empty.
 */
export interface TaxRow {
  readonly gstTaxType?: string | null | undefined;
  readonly accountHead?: string | null | undefined;
  readonly description?: string | null | undefined;

  readonly taxAmount?: DecimalInput;
  readonly baseTaxAmount?: DecimalInput;
  readonly taxAmountAfterDiscountAmount?: DecimalInput;
  readonly baseTaxAmountAfterDiscountAmount?: DecimalInput;

  /** JSON text: { itemCode: [rate, amount] } */
  readonly itemWiseTaxDetail?: string | null | undefined;

  /** Running total of the document up to and including this row */
  readonly total?: DecimalInput;
  readonly baseTotal?: DecimalInput;
}

/**
 * Document-level totals.
 * `netTotal` and `baseTotal` are inputs; everything else is output.
 */
export interface InvoiceTotals {
  readonly netTotal?: DecimalInput;
  readonly baseTotal?: DecimalInput;

  readonly totalTaxesAndCharges?: DecimalInput;
  readonly baseTotalTaxesAndCharges?: DecimalInput;
  readonly grandTotal?: DecimalInput;
  readonly baseGrandTotal?: DecimalInput;
  readonly roundingAdjustment?: DecimalInput;
  readonly roundedTotal?: DecimalInput;
  readonly baseRoundedTotal?: DecimalInput;
  readonly outstandingAmount?: DecimalInput;
}

/**
 * A complete invoice snapshot.
 */
export interface InvoiceSnapshot extends InvoiceTotals {
  /** Document name, carried through untouched */
  readonly name?: string | undefined;

  /** Credit/debit notes are never recalculated */
  readonly isReturn?: boolean | undefined;

  /** Absent means draft */
  readonly docstatus?: DocStatus | undefined;

  readonly items: readonly LineItem[];
  readonly taxes: readonly TaxRow[];
}

/**
 * A single entry of an item-wise tax breakup: [rate, amount].
 */
export type TaxDetailPair = readonly [rate: number, amount: number];

/**
 * Ordered item-wise breakup for one tax row.
 * Entries keep line-item order.
 */
export interface TaxDetailEntry {
  readonly itemCode: string;
  readonly rate: number;
  readonly amount: number;
}
