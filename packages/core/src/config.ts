/**
 * @fileoverview Engine configuration
 *
 * Options are validated once, before the server starts serving. Everything in
 * the resulting config is read-only for the life of the process: the version
 * state, the renderer address, the template resolver.
 */

import { ConfigError } from "./errors.js";
import { consoleLogger, type Logger } from "./logger.js";
import { DEFAULT_SSR_URL, SSR_TIMEOUT_MS } from "./ssr/ssrClient.js";
import type { JsonObject } from "./types/json.js";
import type { TemplateResolver } from "./types/page.js";
import type { RequestHeaders, TemporarySession } from "./types/request.js";
import type { FetchLike } from "./utils/http.js";
import {
  createVersionState,
  type VersionResolution,
  type VersionSource,
  type VersionState,
} from "./version.js";

// ============================================================================
// TYPES
// ============================================================================

/**
 * Stores a temporary session again so it survives a forced refresh. The
 * request is given so the host can find the session it belongs to.
 * A rejection is logged and ignored.
 */
export type ReflashHook = (
  session: TemporarySession,
  request: { headers: RequestHeaders; url: string }
) => void | Promise<void>;

export type SsrOptions = {
  /** Base URL of the renderer, defaults to http://127.0.0.1:13714 */
  url?: string;
  /** Defaults to SSR_TIMEOUT_MS */
  timeoutMs?: number;
};

export type InertiaOptions = {
  /** Public URL of the application, e.g. "http://localhost:3000" */
  url: string;
  /** Asset version, or a function computing it */
  version: VersionSource;
  /** When a version function runs, defaults to "once" */
  versionResolution?: VersionResolution;
  /** Path of the root HTML template */
  templatePath: string;
  templateResolver: TemplateResolver;
  /**
   * Values handed to every template render, read by `@inertia::view.<key>`.
   * `appUrl` defaults to `url`.
   */
  viewProps?: JsonObject;
  /** Enables server-side rendering */
  ssr?: SsrOptions | false;
  reflashSession?: ReflashHook;
  logger?: Logger;
  /** Fetch used for renderer calls, defaults to the global one */
  fetch?: FetchLike;
};

export type InertiaConfig = Readonly<{
  url: string;
  version: VersionState;
  templatePath: string;
  templateResolver: TemplateResolver;
  viewProps: JsonObject;
  ssr: Readonly<{ url: string; timeoutMs: number }> | null;
  reflashSession: ReflashHook | null;
  logger: Logger;
  fetch: FetchLike | null;
}>;

// ============================================================================
// VALIDATION
// ============================================================================

function assertHttpUrl(value: string, label: string): void {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new ConfigError(`${label} must be an absolute URL, got "${value}".`);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new ConfigError(`${label} must use http or https, got "${value}".`);
  }
}

function resolveSsr(ssr: SsrOptions | false | undefined): InertiaConfig["ssr"] {
  if (ssr === undefined || ssr === false) return null;

  const url = ssr.url ?? DEFAULT_SSR_URL;
  assertHttpUrl(url, "ssr.url");

  const timeoutMs = ssr.timeoutMs ?? SSR_TIMEOUT_MS;
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new ConfigError(
      `ssr.timeoutMs must be a positive number, got ${timeoutMs}.`
    );
  }

  return Object.freeze({ url, timeoutMs });
}

// ============================================================================
// FACTORY
// ============================================================================

/**
 * Validates options and builds the process-wide configuration.
 *
 * @throws ConfigError for a missing or malformed option
 *
 * @example
 * const config = createInertiaConfig({
 *   url: "http://localhost:3000",
 *   version: "v1",
 *   templatePath: "www/root.html",
 *   templateResolver: createTemplateResolver({ staticDir: "public" }),
 *   ssr: { url: "http://127.0.0.1:13714" },
 * });
 */
export function createInertiaConfig(options: InertiaOptions): InertiaConfig {
  assertHttpUrl(options.url, "url");

  if (typeof options.version === "string" && options.version.length === 0) {
    throw new ConfigError("version must not be empty.");
  }

  if (options.templatePath.trim().length === 0) {
    throw new ConfigError("templatePath must not be empty.");
  }

  const version = createVersionState(options.version, {
    ...(options.versionResolution ? { resolve: options.versionResolution } : {}),
  });

  return Object.freeze({
    url: options.url,
    version,
    templatePath: options.templatePath,
    templateResolver: options.templateResolver,
    viewProps: options.viewProps ?? {},
    ssr: resolveSsr(options.ssr),
    reflashSession: options.reflashSession ?? null,
    logger: options.logger ?? consoleLogger,
    fetch: options.fetch ?? null,
  });
}
