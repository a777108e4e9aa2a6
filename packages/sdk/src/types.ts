/**
 * @gst-recalc/sdk — SDK types.
 *
 * Types specific to the SDK client layer.
 * Snapshot types are imported from @gst-recalc/types.
 */

import type { InvoiceSnapshot, TaxDetailEntry, TaxKind } from "@gst-recalc/types";

// =============================================================================
// Client Configuration
// =============================================================================

/**
 * Configuration for the recalculation service client.
 */
export interface GstRecalcClientConfig {
  /** Base URL of the service (e.g., "http://localhost:3000") */
  readonly baseUrl: string;
  /** Request timeout in milliseconds (default: 30000) */
  readonly timeout?: number | undefined;
  /** Maximum retry attempts for 5xx and network errors (default: 3) */
  readonly retries?: number | undefined;
  /** First backoff delay in milliseconds, doubled per attempt (default: 500) */
  readonly retryDelayMs?: number | undefined;
  /** Extra headers sent with every request (e.g. a gateway token) */
  readonly headers?: Readonly<Record<string, string>> | undefined;
  /** Custom fetch function (for testing or polyfills) */
  readonly fetchFn?: typeof fetch | undefined;
}

// =============================================================================
// Response Types
// =============================================================================

/**
 * A decoded API response.
 */
export interface GstRecalcResponse<T> {
  /** Response payload (the `data` member of the envelope) */
  readonly data: T;
  /** HTTP status code */
  readonly status: number;
  /** Response headers (selected) */
  readonly headers: Readonly<Record<string, string>>;
}

export interface HealthStatus {
  readonly status: string;
  readonly precision: number;
  readonly timestamp: string;
}

export interface RowClassificationView {
  readonly index: number;
  readonly kind: TaxKind;
  readonly label: string;
}

/**
 * Figures behind an applied recalculation.
 */
export interface RecalculationSummaryView {
  readonly precision: number;
  readonly totalCgst: string;
  readonly totalSgst: string;
  readonly totalIgst: string;
  readonly totalTaxAmount: string;
  readonly rows: readonly RowClassificationView[];
  readonly breakup: {
    readonly central: readonly TaxDetailEntry[];
    readonly state: readonly TaxDetailEntry[];
    readonly integrated: readonly TaxDetailEntry[];
  };
}

export type RecalculateResult =
  | {
      readonly applied: true;
      readonly invoice: InvoiceSnapshot;
      readonly summary: RecalculationSummaryView;
    }
  | {
      readonly applied: false;
      readonly reason: "RETURN_DOCUMENT" | "NOT_DRAFT";
      readonly invoice: InvoiceSnapshot;
    };

export interface RecalculateParams {
  /** Recalculate even a return or non-draft document */
  readonly force?: boolean | undefined;
}

// =============================================================================
// Error Types
// =============================================================================

/**
 * Structured error from the service or the transport.
 *
 * `statusCode` is 0 for timeouts, network failures and unreadable responses.
 */
export class GstRecalcError extends Error {
  /** Error code (e.g., "VALIDATION_ERROR", "INVALID_DECIMAL", "TIMEOUT") */
  readonly code: string;
  /** HTTP status code */
  readonly statusCode: number;
  /** Additional error details (validation issues, etc.) */
  readonly details?: unknown;

  constructor(code: string, message: string, statusCode: number, details?: unknown) {
    super(message);
    this.name = "GstRecalcError";
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}
