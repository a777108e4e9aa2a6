/**
 * @gst-recalc/engine — Lifecycle gate.
 *
 * The host runs recalculation at the end of each validation cycle,
 * after its own tax pass. Returns (credit/debit notes) keep the host's
 * figures, and so does anything already submitted or cancelled.
 */

import type { InvoiceSnapshot } from "@gst-recalc/types";
import { recalculateWithSummary } from "./recalculate.js";
import type {
  Eligibility,
  RecalculateOptions,
  RecalculationOutcome,
} from "./types.js";

export function shouldRecalculate(snapshot: InvoiceSnapshot): Eligibility {
  if (snapshot.isReturn === true) {
    return { eligible: false, reason: "RETURN_DOCUMENT" };
  }
  if ((snapshot.docstatus ?? 0) !== 0) {
    return { eligible: false, reason: "NOT_DRAFT" };
  }
  return { eligible: true };
}

/**
 * Recalculate a draft, non-return invoice; hand anything else back as is.
 */
export function recalculateIfDraft(
  snapshot: InvoiceSnapshot,
  options: RecalculateOptions = {},
): RecalculationOutcome {
  const eligibility = shouldRecalculate(snapshot);
  if (!eligibility.eligible) {
    return { applied: false, reason: eligibility.reason, invoice: snapshot };
  }

  const { invoice, summary } = recalculateWithSummary(snapshot, options);
  return { applied: true, invoice, summary };
}
