/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { RecalculationService } from "../services/recalculation-service.js";

/**
 * Hono environment type for the recalculation service.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** Shared recalculation service (set by the app factory) */
    service: RecalculationService;
  };
}

/**
 * Context variables added by body validation.
 */
export interface ValidatedEnv<T> {
  Variables: {
    validatedBody: T;
  };
}
