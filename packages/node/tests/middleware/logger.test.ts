/**
 * Tests for logger middleware.
 */

import { describe, it, expect } from "vitest";
import { createTestApp, jsonRequest } from "../setup.js";
import { levelForStatus } from "../../src/middleware/logger.js";
import type { RequestLogEntry } from "../../src/middleware/logger.js";

describe("levelForStatus", () => {
  it("maps status classes to levels", () => {
    expect(levelForStatus(200)).toBe("info");
    expect(levelForStatus(304)).toBe("info");
    expect(levelForStatus(400)).toBe("warn");
    expect(levelForStatus(404)).toBe("warn");
    expect(levelForStatus(500)).toBe("error");
    expect(levelForStatus(503)).toBe("error");
  });
});

describe("loggerMiddleware", () => {
  it("calls logFn with request details", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({ logFn: (entry) => entries.push(entry) });

    await app.request(jsonRequest("/health", "GET", undefined, { "X-Request-Id": "log-req-1" }));

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      level: "info",
      method: "GET",
      path: "/health",
      status: 200,
      requestId: "log-req-1",
    });
    expect(entries[0]?.durationMs).toBeGreaterThanOrEqual(0);
  });

  it("logs client errors at warn", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({ logFn: (entry) => entries.push(entry) });

    await app.request(jsonRequest("/api/v1/invoices/recalculate", "POST", { taxes: [] }));

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      level: "warn",
      method: "POST",
      path: "/api/v1/invoices/recalculate",
      status: 400,
    });
  });
});
