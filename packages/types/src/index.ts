/**
 * @gst-recalc/types — Shared invoice snapshot types.
 *
 * Used by the engine, the HTTP service and the SDK.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types; meaning lives in the engine
 */

// Snapshot types
export type {
  DecimalInput,
  DocStatus,
  TaxKind,
  LineItem,
  TaxRow,
  InvoiceTotals,
  InvoiceSnapshot,
  TaxDetailPair,
  TaxDetailEntry,
} from "./invoice.js";

// Runtime type guards
export {
  isDecimalInput,
  isDocStatus,
  isTaxKind,
  isLineItem,
  isTaxRow,
  isInvoiceSnapshot,
} from "./guards.js";
