/**
 * Mock fetch for SDK tests.
 */

import { vi } from "vitest";
import type { Mock } from "vitest";

export interface MockResponse {
  readonly status: number;
  readonly body?: unknown;
  readonly rawBody?: string;
  readonly headers?: Record<string, string>;
  readonly error?: Error;
  /** Never settle until the request is aborted */
  readonly hang?: boolean;
}

function abortError(): Error {
  const error = new Error("The operation was aborted");
  error.name = "AbortError";
  return error;
}

/**
 * A fetch that answers with `responses` in order and fails when called
 * more often than that.
 */
export function createMockFetch(responses: readonly MockResponse[]): Mock<typeof fetch> {
  let callIndex = 0;

  return vi.fn<typeof fetch>(async (_input, init) => {
    const config = responses[callIndex];
    callIndex++;

    if (config === undefined) {
      throw new Error(`Mock fetch called more times than expected (call ${callIndex})`);
    }
    if (config.error !== undefined) {
      throw config.error;
    }
    if (config.hang === true) {
      return new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => reject(abortError()));
      });
    }

    const body =
      config.rawBody ?? (config.body !== undefined ? JSON.stringify(config.body) : "");
    return new Response(body, {
      status: config.status,
      headers: new Headers(config.headers ?? {}),
    });
  });
}

/** The init passed to the call at `index`, failing the test when absent. */
export function initOf(mock: Mock<typeof fetch>, index = 0): RequestInit {
  const init = mock.mock.calls[index]?.[1];
  if (init === undefined) {
    throw new Error(`No RequestInit for call ${String(index)}`);
  }
  return init;
}

/** Header value sent with the call at `index`. */
export function sentHeader(mock: Mock<typeof fetch>, name: string, index = 0): string | null {
  return new Headers(initOf(mock, index).headers).get(name);
}
