/**
 * @fileoverview Request classification
 *
 * Turns the protocol headers of a request into a `RequestKind`. The
 * classification is computed once per request and is terminal: everything
 * downstream (prop resolution, response shape) reads it, nothing changes it.
 */

import { INERTIA_HEADERS, rawHeader, readTextHeader } from "./headers.js";
import type {
  PartialReloadSpec,
  RequestHeaders,
  RequestKind,
} from "./types/request.js";

export const STANDARD_REQUEST: RequestKind = { type: "standard" };

/**
 * Splits a comma separated header into a set of trimmed, non-empty names.
 *
 * @example
 * parseNameList("events, popularUsers,,") // Set { "events", "popularUsers" }
 */
export function parseNameList(value: string | undefined): Set<string> {
  const names = new Set<string>();
  if (value === undefined) return names;

  for (const part of value.split(",")) {
    const name = part.trim();
    if (name.length > 0) names.add(name);
  }

  return names;
}

/**
 * Classifies a request as a standard visit or a partial reload.
 *
 * @throws HeaderError if a partial-reload header is not printable ASCII
 *
 * @example
 * classifyRequest({
 *   "x-inertia-partial-component": "Events",
 *   "x-inertia-partial-data": "events",
 * });
 * // { type: "partial", partial: { component: "Events", only: Set{"events"}, except: Set{} } }
 */
export function classifyRequest(headers: RequestHeaders): RequestKind {
  const component = readTextHeader(headers, INERTIA_HEADERS.PARTIAL_COMPONENT);

  if (component === undefined) {
    return STANDARD_REQUEST;
  }

  const partial: PartialReloadSpec = {
    component,
    only: parseNameList(readTextHeader(headers, INERTIA_HEADERS.PARTIAL_DATA)),
    except: parseNameList(
      readTextHeader(headers, INERTIA_HEADERS.PARTIAL_EXCEPT)
    ),
  };

  return { type: "partial", partial };
}

/**
 * True when the request comes from an already hydrated Inertia client.
 */
export function isInertiaRequest(headers: RequestHeaders): boolean {
  const value = rawHeader(headers, INERTIA_HEADERS.INERTIA);
  return value !== undefined && value.length > 0;
}
