/**
 * GstRecalcClient Tests
 *
 * Verifies each namespace method hits the right route and decodes
 * the payload, using a mock fetch.
 */

import { describe, it, expect } from "vitest";
import type { InvoiceSnapshot } from "@gst-recalc/types";
import { GstRecalcClient } from "../src/client.js";
import { GstRecalcError } from "../src/types.js";
import { createMockFetch, initOf } from "./helpers.js";

const SNAPSHOT: InvoiceSnapshot = {
  name: "SINV-TEST-0200",
  netTotal: 500,
  baseTotal: 500,
  items: [{ itemCode: "SKU-1", amount: 500, igstRate: 12 }],
  taxes: [{ gstTaxType: "IGST" }],
};

const APPLIED = {
  applied: true,
  invoice: {
    ...SNAPSHOT,
    items: [{ itemCode: "SKU-1", amount: 500, igstRate: 12, igstAmount: "60.00" }],
    grandTotal: "560.00",
  },
  summary: {
    precision: 2,
    totalCgst: "0.00",
    totalSgst: "0.00",
    totalIgst: "60.00",
    totalTaxAmount: "60.00",
    rows: [{ index: 0, kind: "integrated", label: "igst" }],
    breakup: { central: [], state: [], integrated: [{ itemCode: "SKU-1", rate: 12, amount: 60 }] },
  },
};

describe("GstRecalcClient.invoices", () => {
  it("posts the snapshot and decodes an applied result", async () => {
    const fetchFn = createMockFetch([{ status: 200, body: { data: APPLIED } }]);
    const client = new GstRecalcClient({ baseUrl: "http://svc.test", fetchFn, retries: 0 });

    const { data } = await client.invoices.recalculate(SNAPSHOT);

    expect(fetchFn.mock.calls[0]?.[0]).toBe("http://svc.test/api/v1/invoices/recalculate");
    expect(initOf(fetchFn).body).toBe(JSON.stringify(SNAPSHOT));
    expect(data.applied).toBe(true);
    if (!data.applied) return;
    expect(data.invoice.grandTotal).toBe("560.00");
    expect(data.summary.totalIgst).toBe("60.00");
  });

  it("adds force=true when forcing", async () => {
    const fetchFn = createMockFetch([{ status: 200, body: { data: APPLIED } }]);
    const client = new GstRecalcClient({ baseUrl: "http://svc.test", fetchFn, retries: 0 });

    await client.invoices.recalculate(SNAPSHOT, { force: true });

    expect(fetchFn.mock.calls[0]?.[0]).toBe(
      "http://svc.test/api/v1/invoices/recalculate?force=true",
    );
  });

  it("decodes a skipped result", async () => {
    const fetchFn = createMockFetch([
      { status: 200, body: { data: { applied: false, reason: "NOT_DRAFT", invoice: SNAPSHOT } } },
    ]);
    const client = new GstRecalcClient({ baseUrl: "http://svc.test", fetchFn, retries: 0 });

    const { data } = await client.invoices.recalculate({ ...SNAPSHOT, docstatus: 1 });

    expect(data).toEqual({ applied: false, reason: "NOT_DRAFT", invoice: SNAPSHOT });
  });

  it("rejects a result with an unknown reason", async () => {
    const fetchFn = createMockFetch([
      { status: 200, body: { data: { applied: false, reason: "LOCKED", invoice: SNAPSHOT } } },
    ]);
    const client = new GstRecalcClient({ baseUrl: "http://svc.test", fetchFn, retries: 0 });

    await expect(client.invoices.recalculate(SNAPSHOT)).rejects.toBeInstanceOf(GstRecalcError);
  });
});

describe("GstRecalcClient.taxDetail", () => {
  it("returns the decoded entries", async () => {
    const fetchFn = createMockFetch([
      { status: 200, body: { data: { entries: [{ itemCode: "SKU-1", rate: 12, amount: 60 }] } } },
    ]);
    const client = new GstRecalcClient({ baseUrl: "http://svc.test", fetchFn, retries: 0 });

    const { data } = await client.taxDetail.parse('{"SKU-1":[12,60]}');

    expect(initOf(fetchFn).body).toBe(JSON.stringify({ itemWiseTaxDetail: '{"SKU-1":[12,60]}' }));
    expect(data).toEqual([{ itemCode: "SKU-1", rate: 12, amount: 60 }]);
  });
});

describe("GstRecalcClient.health", () => {
  it("reads the unwrapped health body", async () => {
    const fetchFn = createMockFetch([
      { status: 200, body: { status: "ok", precision: 2, timestamp: "2026-01-01T00:00:00.000Z" } },
    ]);
    const client = new GstRecalcClient({ baseUrl: "http://svc.test", fetchFn, retries: 0 });

    const { data } = await client.health();

    expect(fetchFn.mock.calls[0]?.[0]).toBe("http://svc.test/health");
    expect(data).toEqual({ status: "ok", precision: 2, timestamp: "2026-01-01T00:00:00.000Z" });
  });
});
