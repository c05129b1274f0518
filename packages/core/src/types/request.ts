/**
 * @fileoverview Request-side types of the protocol
 *
 * Bindings hand the engine a Node-style header record: lowercase names, a
 * string per header, or an array of strings when the header was repeated.
 */

import type { JsonObject } from "./json.js";

// ============================================================================
// HEADERS
// ============================================================================

export type RequestHeaders = Readonly<
  Record<string, string | readonly string[] | undefined>
>;

// ============================================================================
// CLASSIFICATION
// ============================================================================

/**
 * What a partial reload asks for.
 *
 * A non-empty `only` wins over `except`: when the client names the props it
 * wants, the exclusion list is not consulted.
 */
export type PartialReloadSpec = {
  /** Component the client currently displays */
  component: string;
  /** Props explicitly requested (x-inertia-partial-data) */
  only: ReadonlySet<string>;
  /** Props explicitly excluded (x-inertia-partial-except) */
  except: ReadonlySet<string>;
};

export type RequestKind =
  | { type: "standard" }
  | { type: "partial"; partial: PartialReloadSpec };

// ============================================================================
// TEMPORARY SESSION
// ============================================================================

/**
 * Flash data read from the host's session store.
 *
 * Validation errors survive one request so the client can redisplay them;
 * on a forced refresh the engine hands the session back to the host to be
 * stored again.
 */
export type TemporarySession = {
  errors: JsonObject | null;
  prevReqUrl: string;
};
