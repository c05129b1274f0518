/**
 * @fileoverview Page assembly and serialization
 */

import { isDeepStrictEqual } from "util";
import { SerializationError, describeError } from "./errors.js";
import type { JsonObject } from "./types/json.js";
import type { Page } from "./types/page.js";
import type { ResolvedProps } from "./types/props.js";

/**
 * Builds the immutable page record sent to the client.
 *
 * @example
 * buildPage("Events", "/events/80", "v1", { events: [] });
 * // { component: "Events", props: { events: [] }, url: "/events/80", version: "v1" }
 */
export function buildPage(
  component: string,
  url: string,
  version: string | null,
  props: ResolvedProps
): Page {
  return Object.freeze({ component, props, url, version });
}

/**
 * Two pages are equal when all four fields are deeply equal.
 */
export function pagesEqual(a: Page, b: Page): boolean {
  return (
    a.component === b.component &&
    a.url === b.url &&
    a.version === b.version &&
    isDeepStrictEqual(a.props, b.props)
  );
}

/**
 * Shallow check for a parsed JSON object. Values of a `JSON.parse` result are
 * JSON by construction.
 */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Checks that a parsed body has the page wire shape.
 */
export function isPage(value: unknown): value is Page {
  if (!isJsonObject(value)) return false;

  const { component, props, url, version } = value;

  return (
    typeof component === "string" &&
    isJsonObject(props) &&
    typeof url === "string" &&
    (typeof version === "string" || version === null)
  );
}

/**
 * Serializes a page to its wire JSON.
 *
 * @throws SerializationError for values JSON cannot represent (BigInt, cycles)
 */
export function serializePage(page: Page): string {
  try {
    return JSON.stringify({
      component: page.component,
      props: page.props,
      url: page.url,
      version: page.version,
    });
  } catch (error) {
    throw new SerializationError(
      `Failed to serialize page ${page.component}: ${describeError(error)}`,
      { cause: error }
    );
  }
}

const HTML_ATTRIBUTE_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  '"': "&quot;",
  "'": "&#39;",
  "<": "&lt;",
  ">": "&gt;",
};

export function escapeHtmlAttribute(value: string): string {
  return value.replace(/[&"'<>]/g, (char) => HTML_ATTRIBUTE_ESCAPES[char] ?? char);
}

/**
 * Serializes a page for the `data-page` attribute of the app container.
 *
 * @example
 * `<div id="app" data-page="${pageToHtmlAttribute(page)}"></div>`
 */
export function pageToHtmlAttribute(page: Page): string {
  return escapeHtmlAttribute(serializePage(page));
}
