/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body/query validation.
 *
 * Snapshot objects use passthrough: host fields the engine does not
 * know about (qty, uom, ...) come back in the response untouched.
 */

import { z } from "zod";

// =============================================================================
// Shared Schemas
// =============================================================================

const DECIMAL_PATTERN = /^\s*-?\d+(\.\d+)?\s*$/;

export const DecimalInputSchema = z
  .union([
    z.number().finite(),
    z.string().regex(DECIMAL_PATTERN, "Must be a decimal number"),
    z.null(),
  ])
  .optional();

const LabelSchema = z.string().max(256).nullable().optional();

// =============================================================================
// Invoice Snapshot
// =============================================================================

export const LineItemSchema = z
  .object({
    itemCode: z.string().min(1).max(140),
    amount: DecimalInputSchema,
    cgstRate: DecimalInputSchema,
    sgstRate: DecimalInputSchema,
    igstRate: DecimalInputSchema,
    cgstAmount: DecimalInputSchema,
    sgstAmount: DecimalInputSchema,
    igstAmount: DecimalInputSchema,
  })
  .passthrough();

export const TaxRowSchema = z
  .object({
    gstTaxType: LabelSchema,
    accountHead: LabelSchema,
    description: z.string().nullable().optional(),
    taxAmount: DecimalInputSchema,
    baseTaxAmount: DecimalInputSchema,
    taxAmountAfterDiscountAmount: DecimalInputSchema,
    baseTaxAmountAfterDiscountAmount: DecimalInputSchema,
    itemWiseTaxDetail: z.string().nullable().optional(),
    total: DecimalInputSchema,
    baseTotal: DecimalInputSchema,
  })
  .passthrough();

export const InvoiceSnapshotSchema = z
  .object({
    name: z.string().max(140).optional(),
    isReturn: z.boolean().optional(),
    docstatus: z.union([z.literal(0), z.literal(1), z.literal(2)]).optional(),
    netTotal: DecimalInputSchema,
    baseTotal: DecimalInputSchema,
    totalTaxesAndCharges: DecimalInputSchema,
    baseTotalTaxesAndCharges: DecimalInputSchema,
    grandTotal: DecimalInputSchema,
    baseGrandTotal: DecimalInputSchema,
    roundingAdjustment: DecimalInputSchema,
    roundedTotal: DecimalInputSchema,
    baseRoundedTotal: DecimalInputSchema,
    outstandingAmount: DecimalInputSchema,
    items: z.array(LineItemSchema).max(5000),
    taxes: z.array(TaxRowSchema).max(100),
  })
  .passthrough();

export type InvoiceSnapshotDto = z.infer<typeof InvoiceSnapshotSchema>;

export const RecalculateQuerySchema = z.object({
  force: z
    .enum(["true", "false"])
    .transform((v) => v === "true")
    .default("false"),
});

export type RecalculateQuery = z.infer<typeof RecalculateQuerySchema>;

// =============================================================================
// Tax Detail
// =============================================================================

export const ParseTaxDetailSchema = z.object({
  itemWiseTaxDetail: z.string().min(2).max(1_000_000),
});

export type ParseTaxDetailDto = z.infer<typeof ParseTaxDetailSchema>;
