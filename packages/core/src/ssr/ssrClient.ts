/**
 * @fileoverview Server-side rendering through the external renderer
 *
 * THE FLOW:
 * 1. The page is serialized and posted to `<renderer>/render`
 * 2. The renderer answers `{ head: string[], body: string }`
 * 3. The markup is spliced into the root template
 *
 * FALLBACK:
 * Any failure (connection refused, timeout, error status, malformed body) is
 * logged as a warning and reported as `null`. The caller then renders the
 * plain app container and the client hydrates from scratch. SSR failures never
 * fail the request.
 */

import { SsrError } from "../errors.js";
import { consoleLogger, type Logger } from "../logger.js";
import { serializePage } from "../page.js";
import type { Page, SsrResult } from "../types/page.js";
import { postJson, type FetchLike } from "../utils/http.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Upper bound of a single render call */
export const SSR_TIMEOUT_MS = 5000;

/** Default address of the renderer process */
export const DEFAULT_SSR_URL = "http://127.0.0.1:13714";

// ============================================================================
// VALIDATION
// ============================================================================

/**
 * Checks that a renderer answer has the `{ head, body }` shape.
 */
export function isSsrResult(value: unknown): value is SsrResult {
  if (typeof value !== "object" || value === null) {
    return false;
  }

  if (!("head" in value) || !("body" in value)) {
    return false;
  }

  const { head, body } = value;

  return (
    Array.isArray(head) &&
    head.every((item) => typeof item === "string") &&
    typeof body === "string"
  );
}

// ============================================================================
// RENDERING
// ============================================================================

export type SsrRenderOptions = {
  logger?: Logger;
  /** Defaults to SSR_TIMEOUT_MS */
  timeoutMs?: number;
  fetch?: FetchLike;
};

/**
 * Asks the renderer for the markup of a page.
 *
 * @throws SsrError when the renderer fails; `requestSsrRender` is the
 * non-throwing variant used by the controller
 */
export async function fetchSsrRender(
  baseUrl: string,
  page: Page,
  options: Omit<SsrRenderOptions, "logger"> = {}
): Promise<SsrResult> {
  const body = serializePage(page);

  const result = await postJson(`${trimSlash(baseUrl)}/render`, body, {
    timeoutMs: options.timeoutMs ?? SSR_TIMEOUT_MS,
    ...(options.fetch ? { fetch: options.fetch } : {}),
  });

  if (!result.ok) {
    throw new SsrError(result.error);
  }

  if (!isSsrResult(result.data)) {
    throw new SsrError("Renderer answered with a malformed body.");
  }

  return { head: result.data.head, body: result.data.body };
}

/**
 * Renders a page through the renderer, or returns null to fall back to
 * client-side hydration.
 *
 * @example
 * const ssr = await requestSsrRender("http://127.0.0.1:13714", page);
 * const html = ssr ? ssr.body : `<div id="app" data-page="..."></div>`;
 */
export async function requestSsrRender(
  baseUrl: string,
  page: Page,
  options: SsrRenderOptions = {}
): Promise<SsrResult | null> {
  const logger = options.logger ?? consoleLogger;

  try {
    return await fetchSsrRender(baseUrl, page, options);
  } catch (error) {
    if (!(error instanceof SsrError)) throw error;

    logger.warn(
      `Error on server-side rendering page ${page.component}. ${error.message}`
    );
    return null;
  }
}

function trimSlash(url: string): string {
  return url.endsWith("/") ? url.slice(0, -1) : url;
}
