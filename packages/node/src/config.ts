/**
 * @gst-recalc/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import { MAX_PRECISION } from "@gst-recalc/engine";

// =============================================================================
// Schema
// =============================================================================

const BooleanFlag = z
  .enum(["true", "false"])
  .transform((v) => v === "true");

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Rounding
  CURRENCY_PRECISION: z.coerce.number().int().min(0).max(MAX_PRECISION).default(2),

  // Metrics
  METRICS_ENABLED: BooleanFlag.default("true"),

  // Request limits
  MAX_BODY_BYTES: z.coerce.number().int().min(1024).default(1_048_576),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
