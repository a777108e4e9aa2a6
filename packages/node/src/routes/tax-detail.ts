/**
 * Item-wise tax detail routes.
 *
 * POST /api/v1/tax-detail/parse — Decode a row's item-wise breakup text
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ParseTaxDetailSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createTaxDetailRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/parse", validateBody(ParseTaxDetailSchema), (c) => {
    const service = c.get("service");
    const body = c.get("validatedBody");

    const entries = service.parseTaxDetail(body.itemWiseTaxDetail);
    return c.json({ data: { entries } });
  });

  return routes;
}
