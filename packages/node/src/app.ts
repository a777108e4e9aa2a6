/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts so tests can create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import { bodyLimit } from "hono/body-limit";
import { DEFAULT_PRECISION } from "@gst-recalc/engine";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorEnvelope } from "./types/error.js";
import { RecalculationService } from "./services/recalculation-service.js";
import type { RecalculationEvent } from "./services/recalculation-service.js";
import { handleError, handleNotFound } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { metricsMiddleware, MetricsCollector } from "./middleware/metrics.js";
import { createHealthRoutes } from "./routes/health.js";
import { createInvoiceRoutes } from "./routes/invoices.js";
import { createTaxDetailRoutes } from "./routes/tax-detail.js";
import { createMetricsRoute } from "./routes/metrics.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  /** Decimal places for amounts. Default: 2 */
  readonly precision?: number;
  readonly logFn?: (entry: RequestLogEntry) => void;
  /** Observer for every recalculation run */
  readonly onRecalculated?: (event: RecalculationEvent) => void;
  /** Enable metrics collection and GET /metrics. Default: true */
  readonly enableMetrics?: boolean;
  /** Largest accepted API request body. Default: 1 MiB */
  readonly maxBodyBytes?: number;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: RecalculationService;
  readonly metricsCollector: MetricsCollector;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions = {}): AppInstance {
  const service = new RecalculationService({
    precision: options.precision ?? DEFAULT_PRECISION,
    onRecalculated: options.onRecalculated,
  });
  const metricsCollector = new MetricsCollector();
  const enableMetrics = options.enableMetrics !== false;
  const knownPaths = new Set<string>();

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  if (enableMetrics) {
    app.use("*", metricsMiddleware(metricsCollector, knownPaths));
  }

  // ─── Error Handlers ─────────────────────────────────────────────
  app.onError(handleError);
  app.notFound(handleNotFound);

  // ─── Operational Routes ─────────────────────────────────────────
  app.route("/", createHealthRoutes({ precision: service.precision }));

  if (enableMetrics) {
    app.route("/", createMetricsRoute(metricsCollector));
  }

  // ─── API Routes ─────────────────────────────────────────────────
  const maxSize = options.maxBodyBytes ?? 1_048_576;
  app.use(
    "/api/*",
    bodyLimit({
      maxSize,
      onError: (c) =>
        c.json(
          createErrorEnvelope("PAYLOAD_TOO_LARGE", `Request body exceeds ${maxSize} bytes`),
          413,
        ),
    }),
  );

  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  app.route(
    "/api/v1/invoices",
    createInvoiceRoutes({ metrics: enableMetrics ? metricsCollector : undefined }),
  );
  app.route("/api/v1/tax-detail", createTaxDetailRoutes());

  // Concrete route paths label the request metrics; middleware patterns don't.
  for (const route of app.routes) {
    if (!route.path.includes("*")) {
      knownPaths.add(route.path);
    }
  }

  return { app, service, metricsCollector };
}
