/**
 * Runtime Type Guards
 *
 * Narrowing functions for invoice snapshot types.
 * Used at system boundaries (HTTP bodies, host payloads).
 */

import type {
  DecimalInput,
  DocStatus,
  TaxKind,
  LineItem,
  TaxRow,
  InvoiceSnapshot,
} from "./invoice.js";

const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;
const DOC_STATUSES = new Set<unknown>([0, 1, 2]);
const TAX_KINDS = new Set<unknown>(["central", "state", "integrated", "unrecognized"]);

const ITEM_NUMERIC_FIELDS = [
  "amount",
  "cgstRate",
  "sgstRate",
  "igstRate",
  "cgstAmount",
  "sgstAmount",
  "igstAmount",
] as const;

const ROW_NUMERIC_FIELDS = [
  "taxAmount",
  "baseTaxAmount",
  "taxAmountAfterDiscountAmount",
  "baseTaxAmountAfterDiscountAmount",
  "total",
  "baseTotal",
] as const;

const TOTAL_FIELDS = [
  "netTotal",
  "baseTotal",
  "totalTaxesAndCharges",
  "baseTotalTaxesAndCharges",
  "grandTotal",
  "baseGrandTotal",
  "roundingAdjustment",
  "roundedTotal",
  "baseRoundedTotal",
  "outstandingAmount",
] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isOptionalString(value: unknown): boolean {
  return value === undefined || typeof value === "string";
}

function isNullableString(value: unknown): boolean {
  return value === undefined || value === null || typeof value === "string";
}

export function isDecimalInput(value: unknown): value is DecimalInput {
  if (value === null || value === undefined) return true;
  if (typeof value === "number") return Number.isFinite(value);
  if (typeof value === "string") return DECIMAL_PATTERN.test(value.trim());
  return false;
}

export function isDocStatus(value: unknown): value is DocStatus {
  return DOC_STATUSES.has(value);
}

export function isTaxKind(value: unknown): value is TaxKind {
  return TAX_KINDS.has(value);
}

export function isLineItem(value: unknown): value is LineItem {
  if (!isRecord(value)) return false;
  if (typeof value.itemCode !== "string" || value.itemCode.length === 0) return false;
  return ITEM_NUMERIC_FIELDS.every((field) => isDecimalInput(value[field]));
}

export function isTaxRow(value: unknown): value is TaxRow {
  if (!isRecord(value)) return false;
  return (
    isNullableString(value.gstTaxType) &&
    isNullableString(value.accountHead) &&
    isNullableString(value.description) &&
    isNullableString(value.itemWiseTaxDetail) &&
    ROW_NUMERIC_FIELDS.every((field) => isDecimalInput(value[field]))
  );
}

export function isInvoiceSnapshot(value: unknown): value is InvoiceSnapshot {
  if (!isRecord(value)) return false;
  if (!Array.isArray(value.items) || !Array.isArray(value.taxes)) return false;
  if (value.isReturn !== undefined && typeof value.isReturn !== "boolean") return false;
  if (value.docstatus !== undefined && !isDocStatus(value.docstatus)) return false;
  return (
    isOptionalString(value.name) &&
    TOTAL_FIELDS.every((field) => isDecimalInput(value[field])) &&
    value.items.every(isLineItem) &&
    value.taxes.every(isTaxRow)
  );
}
