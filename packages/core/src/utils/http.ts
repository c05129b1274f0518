/**
 * @fileoverview HTTP helpers for talking to the SSR renderer
 *
 * KEY CONCEPTS:
 *
 * 1. TIMEOUTS - Every call is bounded. An AbortController is aborted when the
 *    timer fires, which makes the pending fetch reject with an AbortError.
 *
 * 2. NO RETRIES - Renderer calls are single attempts. A failed attempt is
 *    reported to the caller, which decides what to fall back to.
 *
 * 3. RESULT TYPE - `postJson` never throws; it returns a discriminated union
 *    so the failure path is explicit at the call site.
 */

// ============================================================================
// TYPES
// ============================================================================

/**
 * The subset of `fetch` the helpers use. Tests pass an in-process fake.
 */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type RequestOptions = {
  /** Maximum time to wait for the response */
  timeoutMs: number;
  /** Fetch implementation, defaults to the global one */
  fetch?: FetchLike;
};

/**
 * Result of a request: either the parsed body or a description of the failure.
 */
export type FetchResult<T> =
  | { ok: true; data: T }
  | { ok: false; error: string; status?: number };

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Creates an AbortController with an automatic timeout.
 *
 * Always call `cleanup()` when done so the timer does not keep the process
 * alive.
 *
 * @example
 * const { controller, cleanup } = createTimeoutController(5000);
 * try {
 *   await fetch(url, { signal: controller.signal });
 * } finally {
 *   cleanup();
 * }
 */
export function createTimeoutController(timeoutMs: number): {
  controller: AbortController;
  cleanup: () => void;
} {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  return {
    controller,
    cleanup: () => clearTimeout(timeoutId),
  };
}

/**
 * Performs a fetch bounded by a timeout.
 *
 * @throws Error on network failure or when the timeout elapses
 */
export async function fetchWithTimeout(
  url: string,
  init: RequestInit,
  options: RequestOptions
): Promise<Response> {
  const doFetch = options.fetch ?? fetch;
  const { controller, cleanup } = createTimeoutController(options.timeoutMs);

  try {
    return await doFetch(url, { ...init, signal: controller.signal });
  } catch (error) {
    if (controller.signal.aborted) {
      throw new Error(`Request to ${url} timed out after ${options.timeoutMs}ms`, {
        cause: error,
      });
    }
    throw error;
  } finally {
    cleanup();
  }
}

// ============================================================================
// MAIN FUNCTIONS
// ============================================================================

/**
 * Posts a JSON body and parses the JSON answer.
 *
 * The timeout covers the whole exchange: a peer that sends its headers and
 * then stalls on the body is aborted like one that never answers.
 *
 * @example
 * const result = await postJson("http://127.0.0.1:13714/render", body, {
 *   timeoutMs: 5000,
 * });
 * if (!result.ok) console.warn(result.error);
 */
export async function postJson(
  url: string,
  body: string,
  options: RequestOptions
): Promise<FetchResult<unknown>> {
  const doFetch = options.fetch ?? fetch;
  const { controller, cleanup } = createTimeoutController(options.timeoutMs);
  const timedOut = `Request to ${url} timed out after ${options.timeoutMs}ms`;

  try {
    let response: Response;

    try {
      response = await doFetch(url, {
        method: "POST",
        headers: {
          Accept: "application/json",
          "Content-Type": "application/json",
        },
        body,
        signal: controller.signal,
      });
    } catch (error) {
      return {
        ok: false,
        error: controller.signal.aborted
          ? timedOut
          : error instanceof Error
            ? error.message
            : "Request failed",
      };
    }

    if (!response.ok) {
      return {
        ok: false,
        error: `HTTP ${response.status}: ${response.statusText}`,
        status: response.status,
      };
    }

    try {
      const data: unknown = await response.json();
      return { ok: true, data };
    } catch (error) {
      if (controller.signal.aborted) {
        return { ok: false, error: timedOut };
      }
      return {
        ok: false,
        error: `Invalid JSON in response: ${
          error instanceof Error ? error.message : String(error)
        }`,
      };
    }
  } finally {
    // The body read above is bounded by the timer too
    cleanup();
  }
}
