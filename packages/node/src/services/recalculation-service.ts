/**
 * RecalculationService: the engine behind the HTTP routes.
 *
 * Holds the configured precision, applies the lifecycle gate unless
 * forced, and reports every run to an optional observer (main.ts logs it).
 */

import {
  parseItemWiseTaxDetail,
  recalculateIfDraft,
  recalculateWithSummary,
} from "@gst-recalc/engine";
import type { RecalculationOutcome } from "@gst-recalc/engine";
import type { InvoiceSnapshot, TaxDetailEntry } from "@gst-recalc/types";

// =============================================================================
// Types
// =============================================================================

/**
 * What a run looked like, for observers.
 */
export interface RecalculationEvent {
  readonly invoiceName: string | undefined;
  readonly applied: boolean;
  readonly forced: boolean;
  readonly reason?: string | undefined;
  readonly itemCount: number;
  readonly rowCount: number;
  readonly totalTaxAmount?: string | undefined;
  readonly roundingAdjustment?: string | undefined;
  readonly durationMs: number;
}

export interface RecalculationServiceConfig {
  /** Decimal places for item tax amounts and totals */
  readonly precision: number;
  /** Called after every run, applied or skipped */
  readonly onRecalculated?: ((event: RecalculationEvent) => void) | undefined;
}

export interface RecalculateRequest {
  /** Bypass the draft/non-return gate */
  readonly force?: boolean | undefined;
}

// =============================================================================
// Service
// =============================================================================

export class RecalculationService {
  private readonly _precision: number;
  private readonly _onRecalculated: ((event: RecalculationEvent) => void) | undefined;

  constructor(config: RecalculationServiceConfig) {
    this._precision = config.precision;
    this._onRecalculated = config.onRecalculated;
  }

  get precision(): number {
    return this._precision;
  }

  /**
   * Recalculate an invoice snapshot.
   *
   * @throws {EngineError} INVALID_DECIMAL for malformed numbers
   */
  recalculate(snapshot: InvoiceSnapshot, request: RecalculateRequest = {}): RecalculationOutcome {
    const start = performance.now();
    const forced = request.force === true;
    const options = { precision: this._precision };

    const outcome: RecalculationOutcome = forced
      ? { applied: true, ...recalculateWithSummary(snapshot, options) }
      : recalculateIfDraft(snapshot, options);

    this._onRecalculated?.({
      invoiceName: snapshot.name,
      applied: outcome.applied,
      forced,
      reason: outcome.applied ? undefined : outcome.reason,
      itemCount: snapshot.items.length,
      rowCount: snapshot.taxes.length,
      totalTaxAmount: outcome.applied ? outcome.summary.totalTaxAmount : undefined,
      roundingAdjustment: outcome.applied ? String(outcome.invoice.roundingAdjustment) : undefined,
      durationMs: performance.now() - start,
    });

    return outcome;
  }

  /**
   * Decode a row's item-wise tax detail.
   *
   * @throws {EngineError} INVALID_TAX_DETAIL for malformed text
   */
  parseTaxDetail(text: string): readonly TaxDetailEntry[] {
    return parseItemWiseTaxDetail(text);
  }
}
