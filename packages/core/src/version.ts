/**
 * @fileoverview Asset version state and negotiation
 *
 * The server knows one current asset version. Clients send the version they
 * loaded their bundle with; when it differs, the client must reload.
 *
 * RESOLUTION TIMING:
 * A literal version is fixed. A resolver is invoked exactly once when the
 * state is created (`resolve: "once"`, the default) or on every lookup
 * (`resolve: "perRequest"`) for setups where assets are rebuilt while the
 * server keeps running.
 */

import { isPrintableAscii } from "./headers.js";

// ============================================================================
// TYPES
// ============================================================================

export type VersionSource = string | (() => string);

export type VersionResolution = "once" | "perRequest";

export type VersionState = {
  /** Current asset version */
  get(): string;
};

export type VersionDecision =
  | { type: "fresh" }
  /** Stale hydrated client: answer 409 with x-inertia-location */
  | { type: "forcedRefresh" }
  /** Stale plain navigation: answer an ordinary redirect */
  | { type: "redirect" };

// ============================================================================
// STATE
// ============================================================================

/**
 * Builds the process-wide version state.
 *
 * @example
 * const version = createVersionState(() => manifestHash(), { resolve: "once" });
 * version.get(); // resolver already ran, returns the cached value
 */
export function createVersionState(
  source: VersionSource,
  options: { resolve?: VersionResolution } = {}
): VersionState {
  if (typeof source === "string") {
    return { get: () => source };
  }

  if (options.resolve === "perRequest") {
    return { get: source };
  }

  const resolved = source();
  return { get: () => resolved };
}

// ============================================================================
// NEGOTIATION
// ============================================================================

/**
 * Compares the client's version with the current one.
 *
 * A missing client version counts as fresh: first visits and plain browser
 * navigations never carry the header. A version holding characters outside
 * visible ASCII cannot match and counts as stale.
 */
export function negotiateVersion(input: {
  clientVersion: string | undefined;
  currentVersion: string;
  isInertia: boolean;
}): VersionDecision {
  const { clientVersion, currentVersion, isInertia } = input;

  if (clientVersion === undefined) {
    return { type: "fresh" };
  }

  if (isPrintableAscii(clientVersion) && clientVersion === currentVersion) {
    return { type: "fresh" };
  }

  return isInertia ? { type: "forcedRefresh" } : { type: "redirect" };
}
