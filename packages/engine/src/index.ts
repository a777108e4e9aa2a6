/**
 * @gst-recalc/engine — GST recalculation engine.
 *
 * Recomputes item taxes, tax rows and document totals of an invoice
 * after the host's standard tax pass, so that figures match an
 * accounting package that rounds item by item, half-up.
 *
 * - All monetary arithmetic uses bigint (no floating point)
 * - Inputs are never mutated; each run returns a new snapshot
 * - Rerunning on its own output gives the same output
 */

// Recalculation
export {
  recalculate,
  recalculateWithSummary,
  computeItemTax,
} from "./recalculate.js";

// Lifecycle gate
export { shouldRecalculate, recalculateIfDraft } from "./lifecycle.js";

// Classification
export { classifyTaxLabel, classifyTaxRow, taxRowLabel } from "./classify.js";

// Item-wise breakup
export {
  TaxBreakup,
  serializeItemWiseTaxDetail,
  parseItemWiseTaxDetail,
} from "./breakup.js";

// Rounding
export {
  roundHalfUp,
  roundHalfUpToInteger,
  roundHalfUpText,
  roundHalfUpToIntegerText,
} from "./rounding.js";

// Decimal arithmetic
export {
  parseDecimal,
  numberToDecimal,
  toDecimal,
  formatDecimal,
  decimalToNumber,
  rescale,
  addDecimal,
  subtractDecimal,
  multiplyDecimal,
  shiftDecimal,
  sumDecimals,
  compareDecimal,
  isZeroDecimal,
  isPositiveDecimal,
  zeroDecimal,
} from "./decimal.js";

// Types
export type {
  Decimal,
  RecognizedTaxKind,
  RecalculateOptions,
  RowClassification,
  RecalculationSummary,
  RecalculationResult,
  SkipReason,
  Eligibility,
  RecalculationOutcome,
  EngineErrorCode,
} from "./types.js";

export {
  EngineError,
  DEFAULT_PRECISION,
  MAX_PRECISION,
  RECOGNIZED_TAX_KINDS,
} from "./types.js";
