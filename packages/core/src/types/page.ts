/**
 * @fileoverview Page-side types of the protocol
 *
 * The `Page` object is the contract between server and client. It travels as
 * the JSON body of hydrated requests, as the `data-page` attribute of the
 * first HTML response, and as the body sent to the SSR renderer.
 *
 * WIRE SHAPE:
 * ```json
 * { "component": "Users/Index", "props": {}, "url": "/users", "version": "v1" }
 * ```
 */

import type { JsonObject } from "./json.js";
import type { ResolvedProps } from "./props.js";

export type Page = Readonly<{
  /** Name of the client-side page component */
  component: string;
  /** Merged route and shared props */
  props: ResolvedProps;
  /** The request URL (path and query) */
  url: string;
  /** Current asset version */
  version: string | null;
}>;

/**
 * Markup returned by the SSR renderer.
 */
export type SsrResult = {
  /** Elements to inject in the document head, in order */
  head: string[];
  /** Markup of the page container */
  body: string;
};

/**
 * Everything the root template receives on a full visit.
 */
export type ViewData = {
  page: Page;
  /** Pre-rendered markup, or null when rendering falls back to the client */
  ssr: SsrResult | null;
  /**
   * Values configured once for every template render, plus `appUrl` from
   * the configured application URL
   */
  viewProps: JsonObject;
};

/**
 * Renders the root HTML document.
 *
 * Rejections are turned into a RenderError by the engine.
 */
export type TemplateResolver = (
  templatePath: string,
  view: ViewData
) => Promise<string>;
