/**
 * @gst-recalc/sdk — HTTP Client.
 *
 * Wraps native fetch() with:
 * - Request ID generation
 * - Timeout handling
 * - Retry logic (exponential backoff for 5xx and network errors)
 * - Error normalization
 * - Schema-checked responses
 */

import type { ZodType, ZodTypeDef } from "zod";
import type { GstRecalcClientConfig, GstRecalcResponse } from "./types.js";
import { GstRecalcError } from "./types.js";
import { DataEnvelopeSchema, ErrorEnvelopeSchema } from "./schemas.js";

// =============================================================================
// Internal Helpers
// =============================================================================

const MAX_BACKOFF_MS = 10_000;

function generateRequestId(): string {
  return `sdk-${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 8)}`;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Parse a response body as JSON. Empty and non-JSON bodies yield undefined.
 */
async function parseResponseBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (text.length === 0) {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function extractHeaders(response: Response): Record<string, string> {
  const result: Record<string, string> = {};
  for (const name of ["content-type", "x-request-id", "retry-after"]) {
    const value = response.headers.get(name);
    if (value !== null) {
      result[name] = value;
    }
  }
  return result;
}

/**
 * Turn a non-2xx response into a GstRecalcError, using the service's
 * error envelope when there is one.
 */
function toServiceError(status: number, body: unknown, attempts: number): GstRecalcError {
  const envelope = ErrorEnvelopeSchema.safeParse(body);
  if (envelope.success) {
    const { code, message, details } = envelope.data.error;
    return new GstRecalcError(code, message, status, details);
  }
  return status >= 500
    ? new GstRecalcError("SERVER_ERROR", `HTTP ${status} after ${attempts} attempts`, status)
    : new GstRecalcError("CLIENT_ERROR", `HTTP ${status}`, status);
}

// =============================================================================
// HTTP Client
// =============================================================================

export interface RequestOptions {
  /** Whether the payload sits under `data` (default: true) */
  readonly envelope?: boolean | undefined;
}

/**
 * Low-level HTTP client for the recalculation service.
 */
export class HttpClient {
  private readonly baseUrl: string;
  private readonly timeout: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly extraHeaders: Readonly<Record<string, string>>;
  private readonly fetchFn: typeof fetch;

  constructor(config: GstRecalcClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.timeout = config.timeout ?? 30_000;
    this.maxRetries = config.retries ?? 3;
    this.retryDelayMs = config.retryDelayMs ?? 500;
    this.extraHeaders = config.headers ?? {};
    this.fetchFn = config.fetchFn ?? globalThis.fetch;
  }

  async get<T>(
    path: string,
    schema: ZodType<T, ZodTypeDef, unknown>,
    options: RequestOptions = {},
  ): Promise<GstRecalcResponse<T>> {
    return this.request("GET", path, schema, undefined, options);
  }

  async post<T>(
    path: string,
    body: unknown,
    schema: ZodType<T, ZodTypeDef, unknown>,
    options: RequestOptions = {},
  ): Promise<GstRecalcResponse<T>> {
    return this.request("POST", path, schema, body, options);
  }

  /**
   * Core request method with retry logic.
   *
   * 4xx responses and schema mismatches are never retried.
   */
  private async request<T>(
    method: string,
    path: string,
    schema: ZodType<T, ZodTypeDef, unknown>,
    body: unknown,
    options: RequestOptions,
  ): Promise<GstRecalcResponse<T>> {
    const url = `${this.baseUrl}${path}`;
    const init: RequestInit = {
      method,
      headers: {
        ...this.extraHeaders,
        "Content-Type": "application/json",
        Accept: "application/json",
        "X-Request-Id": generateRequestId(),
      },
    };
    if (body !== undefined) {
      init.body = JSON.stringify(body);
    }

    for (let attempt = 0; ; attempt++) {
      const canRetry = attempt < this.maxRetries;

      let response: Response;
      try {
        response = await this.fetchWithTimeout(url, init);
      } catch (error) {
        if (canRetry) {
          await this.backoff(attempt);
          continue;
        }
        if (error instanceof GstRecalcError) {
          throw error;
        }
        throw new GstRecalcError(
          "NETWORK_ERROR",
          error instanceof Error ? error.message : "Network error",
          0,
        );
      }

      const responseBody = await parseResponseBody(response);

      if (response.ok) {
        return {
          data: this.decode(responseBody, schema, response.status, options.envelope !== false),
          status: response.status,
          headers: extractHeaders(response),
        };
      }

      if (response.status >= 500 && canRetry) {
        await this.backoff(attempt);
        continue;
      }

      throw toServiceError(response.status, responseBody, attempt + 1);
    }
  }

  private decode<T>(
    body: unknown,
    schema: ZodType<T, ZodTypeDef, unknown>,
    status: number,
    enveloped: boolean,
  ): T {
    const envelope = enveloped ? DataEnvelopeSchema.safeParse(body) : undefined;
    const payload =
      envelope === undefined
        ? schema.safeParse(body)
        : envelope.success
          ? schema.safeParse(envelope.data.data)
          : undefined;
    if (payload === undefined || !payload.success) {
      throw new GstRecalcError(
        "INVALID_RESPONSE",
        "Response body does not match the expected shape",
        status,
        payload?.error.issues,
      );
    }
    return payload.data;
  }

  private async backoff(attempt: number): Promise<void> {
    await sleep(Math.min(this.retryDelayMs * 2 ** attempt, MAX_BACKOFF_MS));
  }

  /**
   * Fetch with a timeout using AbortController.
   */
  private async fetchWithTimeout(url: string, init: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      return await this.fetchFn(url, { ...init, signal: controller.signal });
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new GstRecalcError("TIMEOUT", `Request timed out after ${this.timeout}ms`, 0);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
