/**
 * Invoice recalculation routes.
 *
 * POST /api/v1/invoices/recalculate         — Recalculate a draft invoice snapshot
 * POST /api/v1/invoices/recalculate?force=true — Recalculate regardless of lifecycle
 *
 * A skipped document (return or non-draft) is a 200 with `applied: false`
 * and the snapshot echoed back unchanged.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { InvoiceSnapshotSchema, RecalculateQuerySchema } from "../types/dto.js";
import { validateBody, formatZodErrors } from "../middleware/validate.js";
import { createErrorEnvelope } from "../types/error.js";
import type { MetricsCollector } from "../middleware/metrics.js";

export const INVOICES_METRIC = "gst_recalc_invoices_total";

export interface InvoiceRouteDeps {
  readonly metrics?: MetricsCollector | undefined;
}

export function createInvoiceRoutes(deps?: InvoiceRouteDeps): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();
  const metrics = deps?.metrics;

  routes.post("/recalculate", validateBody(InvoiceSnapshotSchema), (c) => {
    const queryResult = RecalculateQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
          issues: formatZodErrors(queryResult.error),
        }),
        400,
      );
    }

    const service = c.get("service");
    const snapshot = c.get("validatedBody");
    const outcome = service.recalculate(snapshot, { force: queryResult.data.force });

    if (!outcome.applied) {
      metrics?.incrementCounter(
        INVOICES_METRIC,
        { outcome: outcome.reason === "RETURN_DOCUMENT" ? "skipped_return" : "skipped_not_draft" },
        "Invoice recalculation requests by outcome",
      );
      return c.json({
        data: { applied: false, reason: outcome.reason, invoice: outcome.invoice },
      });
    }

    metrics?.incrementCounter(
      INVOICES_METRIC,
      { outcome: "applied" },
      "Invoice recalculation requests by outcome",
    );
    return c.json({
      data: { applied: true, invoice: outcome.invoice, summary: outcome.summary },
    });
  });

  return routes;
}
