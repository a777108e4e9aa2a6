/**
 * Shared test helpers for @gst-recalc/engine.
 */

import type { InvoiceSnapshot, LineItem, TaxRow } from "@gst-recalc/types";
import { EngineError } from "../src/types.js";
import type { EngineErrorCode } from "../src/types.js";

/**
 * Run `fn` and return the code of the EngineError it throws,
 * or undefined when it throws nothing (or something else).
 */
export function engineErrorCode(fn: () => unknown): EngineErrorCode | undefined {
  try {
    fn();
  } catch (err) {
    return err instanceof EngineError ? err.code : undefined;
  }
  return undefined;
}

/**
 * Build a draft snapshot with matching net and base totals.
 */
export function invoice(
  total: string | number,
  items: readonly LineItem[],
  taxes: readonly TaxRow[],
): InvoiceSnapshot {
  return { name: "SINV-TEST-0001", docstatus: 0, netTotal: total, baseTotal: total, items, taxes };
}

/** Row at `index`, failing the test when absent. */
export function rowAt(snapshot: InvoiceSnapshot, index: number): TaxRow {
  const row = snapshot.taxes[index];
  if (row === undefined) {
    throw new Error(`No tax row at ${String(index)}`);
  }
  return row;
}

/** Item at `index`, failing the test when absent. */
export function itemAt(snapshot: InvoiceSnapshot, index: number): LineItem {
  const item = snapshot.items[index];
  if (item === undefined) {
    throw new Error(`No line item at ${String(index)}`);
  }
  return item;
}
