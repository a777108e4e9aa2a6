/**
 * @gst-recalc/sdk — Response schemas.
 *
 * Payloads are checked before they are handed to callers; a payload that
 * does not match becomes an INVALID_RESPONSE error.
 */

import { z } from "zod";
import type { ZodType, ZodTypeDef } from "zod";
import { isInvoiceSnapshot, isTaxKind } from "@gst-recalc/types";
import type { InvoiceSnapshot, TaxDetailEntry, TaxKind } from "@gst-recalc/types";
import type { HealthStatus, RecalculateResult } from "./types.js";

export const DataEnvelopeSchema = z.object({ data: z.unknown() });

export const ErrorEnvelopeSchema = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
    details: z.unknown().optional(),
  }),
});

const InvoiceSchema = z.custom<InvoiceSnapshot>(isInvoiceSnapshot, "Invalid invoice snapshot");
const TaxKindSchema = z.custom<TaxKind>(isTaxKind, "Invalid tax kind");

const TaxDetailEntrySchema: ZodType<TaxDetailEntry, ZodTypeDef, unknown> = z.object({
  itemCode: z.string(),
  rate: z.number(),
  amount: z.number(),
});

export const HealthSchema: ZodType<HealthStatus, ZodTypeDef, unknown> = z.object({
  status: z.string(),
  precision: z.number().int(),
  timestamp: z.string(),
});

export const TaxDetailEntriesSchema = z.object({
  entries: z.array(TaxDetailEntrySchema),
});

export const RecalculateResultSchema: ZodType<RecalculateResult, ZodTypeDef, unknown> =
  z.discriminatedUnion("applied", [
    z.object({
      applied: z.literal(true),
      invoice: InvoiceSchema,
      summary: z.object({
        precision: z.number().int(),
        totalCgst: z.string(),
        totalSgst: z.string(),
        totalIgst: z.string(),
        totalTaxAmount: z.string(),
        rows: z.array(
          z.object({ index: z.number().int(), kind: TaxKindSchema, label: z.string() }),
        ),
        breakup: z.object({
          central: z.array(TaxDetailEntrySchema),
          state: z.array(TaxDetailEntrySchema),
          integrated: z.array(TaxDetailEntrySchema),
        }),
      }),
    }),
    z.object({
      applied: z.literal(false),
      reason: z.enum(["RETURN_DOCUMENT", "NOT_DRAFT"]),
      invoice: InvoiceSchema,
    }),
  ]);
