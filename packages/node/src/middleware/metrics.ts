/**
 * Prometheus metrics middleware + collector.
 *
 * Hand-rolled Prometheus text format, no prom-client dependency.
 * Collects:
 * - http_requests_total (counter, by method + path + status)
 * - http_request_duration_seconds (histogram, by method + path)
 * - named business counters, e.g. gst_recalc_invoices_total{outcome="applied"}
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

// =============================================================================
// Types
// =============================================================================

export type MetricLabels = Readonly<Record<string, string>>;

interface Series {
  readonly labels: MetricLabels;
  value: number;
}

interface Histogram {
  readonly labels: MetricLabels;
  readonly bucketCounts: number[];
  sum: number;
  count: number;
}

interface NamedCounter {
  readonly help: string;
  readonly series: Map<string, Series>;
}

export const DEFAULT_BUCKETS: readonly number[] = [
  0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5,
];

/** Path label used for requests that matched no route. */
export const UNMATCHED_PATH = "unmatched";

// =============================================================================
// Label Helpers
// =============================================================================

function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n");
}

function sortedEntries(labels: MetricLabels): [string, string][] {
  return Object.entries(labels).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

function seriesKey(labels: MetricLabels): string {
  return sortedEntries(labels)
    .map(([k, v]) => `${k}=${v}`)
    .join("\u0000");
}

export function formatLabels(labels: MetricLabels): string {
  const parts = sortedEntries(labels).map(([k, v]) => `${k}="${escapeLabelValue(v)}"`);
  return parts.length > 0 ? `{${parts.join(",")}}` : "";
}

// =============================================================================
// Metrics Collector
// =============================================================================

export class MetricsCollector {
  private readonly _requests = new Map<string, Series>();
  private readonly _durations = new Map<string, Histogram>();
  private readonly _counters = new Map<string, NamedCounter>();
  private readonly _buckets: readonly number[];

  constructor(buckets: readonly number[] = DEFAULT_BUCKETS) {
    this._buckets = [...buckets].sort((a, b) => a - b);
  }

  /**
   * Record a finished HTTP request.
   */
  recordRequest(method: string, path: string, status: number, durationMs: number): void {
    const counterLabels = { method, path, status: String(status) };
    const key = seriesKey(counterLabels);
    const series = this._requests.get(key);
    if (series !== undefined) {
      series.value++;
    } else {
      this._requests.set(key, { labels: counterLabels, value: 1 });
    }

    const histLabels = { method, path };
    const histKey = seriesKey(histLabels);
    let hist = this._durations.get(histKey);
    if (hist === undefined) {
      hist = {
        labels: histLabels,
        bucketCounts: this._buckets.map(() => 0),
        sum: 0,
        count: 0,
      };
      this._durations.set(histKey, hist);
    }

    const seconds = durationMs / 1000;
    hist.sum += seconds;
    hist.count++;
    for (let i = 0; i < this._buckets.length; i++) {
      const le = this._buckets[i];
      if (le !== undefined && seconds <= le) {
        hist.bucketCounts[i] = (hist.bucketCounts[i] ?? 0) + 1;
      }
    }
  }

  /**
   * Increment a named counter. The first call for a name fixes its HELP text.
   */
  incrementCounter(
    name: string,
    labels: MetricLabels = {},
    help = "Business metric counter",
  ): void {
    let counter = this._counters.get(name);
    if (counter === undefined) {
      counter = { help, series: new Map() };
      this._counters.set(name, counter);
    }

    const key = seriesKey(labels);
    const series = counter.series.get(key);
    if (series !== undefined) {
      series.value++;
    } else {
      counter.series.set(key, { labels: { ...labels }, value: 1 });
    }
  }

  /**
   * Current value of a named counter series, 0 when never incremented.
   */
  counterValue(name: string, labels: MetricLabels = {}): number {
    return this._counters.get(name)?.series.get(seriesKey(labels))?.value ?? 0;
  }

  /**
   * Render metrics in Prometheus text exposition format.
   */
  render(): string {
    const lines: string[] = [
      "# HELP http_requests_total Total HTTP requests",
      "# TYPE http_requests_total counter",
    ];
    for (const { labels, value } of this._requests.values()) {
      lines.push(`http_requests_total${formatLabels(labels)} ${value}`);
    }

    lines.push("# HELP http_request_duration_seconds HTTP request duration in seconds");
    lines.push("# TYPE http_request_duration_seconds histogram");
    for (const hist of this._durations.values()) {
      this._buckets.forEach((le, i) => {
        const bucketLabels = { ...hist.labels, le: String(le) };
        lines.push(
          `http_request_duration_seconds_bucket${formatLabels(bucketLabels)} ${hist.bucketCounts[i] ?? 0}`,
        );
      });
      lines.push(
        `http_request_duration_seconds_bucket${formatLabels({ ...hist.labels, le: "+Inf" })} ${hist.count}`,
      );
      lines.push(`http_request_duration_seconds_sum${formatLabels(hist.labels)} ${hist.sum}`);
      lines.push(`http_request_duration_seconds_count${formatLabels(hist.labels)} ${hist.count}`);
    }

    for (const [name, counter] of this._counters) {
      lines.push(`# HELP ${name} ${counter.help}`);
      lines.push(`# TYPE ${name} counter`);
      for (const { labels, value } of counter.series.values()) {
        lines.push(`${name}${formatLabels(labels)} ${value}`);
      }
    }

    return lines.join("\n") + "\n";
  }

  clear(): void {
    this._requests.clear();
    this._durations.clear();
    this._counters.clear();
  }
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Create metrics collection middleware.
 *
 * Only paths in `knownPaths` get their own label. Everything else,
 * including oversized bodies rejected before routing, is recorded
 * under `UNMATCHED_PATH`, so scanners cannot grow the series set.
 * The set is read per request and may be filled after the routes are
 * mounted.
 */
export function metricsMiddleware(
  collector: MetricsCollector,
  knownPaths: ReadonlySet<string>,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = performance.now();
    await next();

    const status = c.res.status;
    const path = status !== 404 && knownPaths.has(c.req.path) ? c.req.path : UNMATCHED_PATH;
    collector.recordRequest(c.req.method, path, status, performance.now() - start);
  };
}
