/**
 * @gst-recalc/engine — Internal types for the recalculation engine.
 *
 * These extend the shared @gst-recalc/types with engine-specific
 * structures used by the engine and its callers.
 *
 * Rules:
 * - All types are readonly
 * - Inputs are never mutated; results are fresh objects
 * - Fail-closed: malformed numbers throw, never silently become zero
 */

import type {
  InvoiceSnapshot,
  TaxDetailEntry,
  TaxKind,
} from "@gst-recalc/types";

// ─── Decimal ─────────────────────────────────────────────────────────────

/**
 * An exact decimal: `units / 10^scale`.
 *
 * "100.05" → { units: 10005n, scale: 2 }
 */
export interface Decimal {
  readonly units: bigint;
  readonly scale: number;
}

// ─── Tax Kinds ───────────────────────────────────────────────────────────

/** Tax kinds that carry amounts. */
export type RecognizedTaxKind = Exclude<TaxKind, "unrecognized">;

/** Evaluation order of the classifier. First match wins. */
export const RECOGNIZED_TAX_KINDS: readonly RecognizedTaxKind[] = [
  "central",
  "state",
  "integrated",
] as const;

// ─── Options ─────────────────────────────────────────────────────────────

/** Decimal places used when none are given. */
export const DEFAULT_PRECISION = 2;

/** Largest accepted precision. */
export const MAX_PRECISION = 6;

/**
 * Options for a recalculation run.
 */
export interface RecalculateOptions {
  /**
   * Decimal places for item tax amounts and formatted outputs.
   * Integer in 0..6, default 2.
   */
  readonly precision?: number | undefined;
}

// ─── Results ─────────────────────────────────────────────────────────────

/**
 * Classification of one tax row, in row order.
 */
export interface RowClassification {
  readonly index: number;
  readonly kind: TaxKind;
  /** Lower-cased label the classification was read from */
  readonly label: string;
}

/**
 * Figures computed during a run, for logging and audit.
 */
export interface RecalculationSummary {
  readonly precision: number;
  readonly totalCgst: string;
  readonly totalSgst: string;
  readonly totalIgst: string;
  readonly totalTaxAmount: string;
  readonly rows: readonly RowClassification[];
  readonly breakup: Readonly<Record<RecognizedTaxKind, readonly TaxDetailEntry[]>>;
}

/**
 * A recalculated snapshot together with its summary.
 */
export interface RecalculationResult {
  readonly invoice: InvoiceSnapshot;
  readonly summary: RecalculationSummary;
}

/** Why the lifecycle gate refused a document. */
export type SkipReason = "RETURN_DOCUMENT" | "NOT_DRAFT";

/**
 * Outcome of the lifecycle gate.
 */
export type Eligibility =
  | { readonly eligible: true }
  | { readonly eligible: false; readonly reason: SkipReason };

/**
 * Outcome of a gated recalculation.
 * When skipped, `invoice` is the input snapshot unchanged.
 */
export type RecalculationOutcome =
  | {
      readonly applied: true;
      readonly invoice: InvoiceSnapshot;
      readonly summary: RecalculationSummary;
    }
  | {
      readonly applied: false;
      readonly reason: SkipReason;
      readonly invoice: InvoiceSnapshot;
    };

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for engine operations. */
export type EngineErrorCode =
  | "INVALID_DECIMAL"
  | "INVALID_PRECISION"
  | "INVALID_TAX_DETAIL";

/**
 * Structured error from the engine.
 * Always thrown, never returned.
 */
export class EngineError extends Error {
  public readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string) {
    super(message);
    this.name = "EngineError";
    this.code = code;
  }
}
