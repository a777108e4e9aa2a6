/**
 * Health check route.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export interface HealthInfo {
  /** Currency precision the service rounds to */
  readonly precision: number;
}

export function createHealthRoutes(info: HealthInfo): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      precision: info.precision,
      timestamp: new Date().toISOString(),
    });
  });

  return routes;
}
