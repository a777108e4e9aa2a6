/**
 * @gst-recalc/sdk — Typed HTTP client for the GST recalculation service.
 *
 * @packageDocumentation
 */

// Types
export type {
  GstRecalcClientConfig,
  GstRecalcResponse,
  HealthStatus,
  RowClassificationView,
  RecalculationSummaryView,
  RecalculateResult,
  RecalculateParams,
} from "./types.js";

export { GstRecalcError } from "./types.js";

// HTTP Client
export { HttpClient } from "./http-client.js";
export type { RequestOptions } from "./http-client.js";

// Response schemas
export {
  HealthSchema,
  RecalculateResultSchema,
  TaxDetailEntriesSchema,
} from "./schemas.js";

// Client
export { GstRecalcClient, InvoicesNamespace, TaxDetailNamespace } from "./client.js";
