/**
 * @gst-recalc/sdk — Recalculation service client.
 *
 * Namespace grouping: client.invoices, client.taxDetail.
 */

import type { InvoiceSnapshot, TaxDetailEntry } from "@gst-recalc/types";
import type {
  GstRecalcClientConfig,
  GstRecalcResponse,
  HealthStatus,
  RecalculateParams,
  RecalculateResult,
} from "./types.js";
import { HttpClient } from "./http-client.js";
import { HealthSchema, RecalculateResultSchema, TaxDetailEntriesSchema } from "./schemas.js";

// =============================================================================
// Namespaces
// =============================================================================

export class InvoicesNamespace {
  constructor(private readonly http: HttpClient) {}

  /**
   * Recalculate a snapshot. A return or non-draft document comes back
   * with `applied: false` unless `force` is set.
   */
  async recalculate(
    snapshot: InvoiceSnapshot,
    params?: RecalculateParams,
  ): Promise<GstRecalcResponse<RecalculateResult>> {
    const path =
      params?.force === true
        ? "/api/v1/invoices/recalculate?force=true"
        : "/api/v1/invoices/recalculate";
    return this.http.post(path, snapshot, RecalculateResultSchema);
  }
}

export class TaxDetailNamespace {
  constructor(private readonly http: HttpClient) {}

  /**
   * Decode a row's item-wise tax detail text.
   */
  async parse(itemWiseTaxDetail: string): Promise<GstRecalcResponse<readonly TaxDetailEntry[]>> {
    const result = await this.http.post(
      "/api/v1/tax-detail/parse",
      { itemWiseTaxDetail },
      TaxDetailEntriesSchema,
    );
    return { data: result.data.entries, status: result.status, headers: result.headers };
  }
}

// =============================================================================
// Client
// =============================================================================

/**
 * Client for the GST recalculation service.
 *
 * @example
 * ```ts
 * const client = new GstRecalcClient({ baseUrl: "http://localhost:3000" });
 * const { data } = await client.invoices.recalculate(snapshot);
 * if (data.applied) console.log(data.invoice.grandTotal);
 * ```
 */
export class GstRecalcClient {
  readonly invoices: InvoicesNamespace;
  readonly taxDetail: TaxDetailNamespace;
  private readonly http: HttpClient;

  constructor(config: GstRecalcClientConfig) {
    this.http = new HttpClient(config);
    this.invoices = new InvoicesNamespace(this.http);
    this.taxDetail = new TaxDetailNamespace(this.http);
  }

  /**
   * Liveness check. The health route answers without a data envelope.
   */
  async health(): Promise<GstRecalcResponse<HealthStatus>> {
    return this.http.get("/health", HealthSchema, { envelope: false });
  }
}
