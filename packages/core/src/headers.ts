/**
 * @fileoverview Protocol header names and safe header reading
 */

import { HeaderError } from "./errors.js";
import type { RequestHeaders } from "./types/request.js";

/**
 * Header names of the Inertia protocol, lowercase as Node delivers them.
 */
export const INERTIA_HEADERS = {
  INERTIA: "x-inertia",
  VERSION: "x-inertia-version",
  PARTIAL_COMPONENT: "x-inertia-partial-component",
  PARTIAL_DATA: "x-inertia-partial-data",
  PARTIAL_EXCEPT: "x-inertia-partial-except",
  LOCATION: "x-inertia-location",
} as const;

// Visible ASCII plus horizontal tab
const PRINTABLE_ASCII = /^[\t\x20-\x7e]*$/;

/**
 * Returns the raw value of a header, joining repeated values with a comma.
 */
export function rawHeader(
  headers: RequestHeaders,
  name: string
): string | undefined {
  const value = headers[name];
  if (value === undefined) return undefined;
  return typeof value === "string" ? value : value.join(",");
}

export function isPrintableAscii(value: string): boolean {
  return PRINTABLE_ASCII.test(value);
}

/**
 * Reads a header as text.
 *
 * @throws HeaderError if the value holds characters outside visible ASCII
 */
export function readTextHeader(
  headers: RequestHeaders,
  name: string
): string | undefined {
  const value = rawHeader(headers, name);
  if (value === undefined) return undefined;

  if (!isPrintableAscii(value)) {
    throw new HeaderError(
      `Header ${name}'s value must contain only printable ASCII characters.`
    );
  }

  return value;
}
