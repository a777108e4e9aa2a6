/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export type { HealthInfo } from "./health.js";
export { createInvoiceRoutes, INVOICES_METRIC } from "./invoices.js";
export type { InvoiceRouteDeps } from "./invoices.js";
export { createTaxDetailRoutes } from "./tax-detail.js";
export { createMetricsRoute } from "./metrics.js";
