/**
 * Type barrel — re-exports all public types from @gst-recalc/node.
 */

// DTOs
export {
  DecimalInputSchema,
  LineItemSchema,
  TaxRowSchema,
  InvoiceSnapshotSchema,
  RecalculateQuerySchema,
  ParseTaxDetailSchema,
} from "./dto.js";
export type { InvoiceSnapshotDto, RecalculateQuery, ParseTaxDetailDto } from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// App env
export type { AppEnv, ValidatedEnv } from "./api-contract.js";
