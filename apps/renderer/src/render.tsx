/**
 * @fileoverview Renders a page to markup for the SSR endpoint
 *
 * The body is the same container the client mounts on, with the component
 * markup inside, so hydration finds identical HTML:
 *
 * <div id="app" data-page="{...}"><main>...</main></div>
 */

import { renderToString } from "react-dom/server";
import {
  RenderError,
  escapeHtmlAttribute,
  pageToHtmlAttribute,
  type Page,
  type SsrResult,
} from "@inertia-node/core";
import { pages, type PageModule } from "./pages/index.js";

export function findPage(
  component: string,
  registry: Readonly<Record<string, PageModule>> = pages
): PageModule {
  const page = Object.hasOwn(registry, component) ? registry[component] : undefined;
  if (!page) {
    throw new RenderError(`Unknown page component "${component}".`);
  }
  return page;
}

/**
 * @throws RenderError for a component the registry does not know
 */
export function renderPage(
  page: Page,
  registry: Readonly<Record<string, PageModule>> = pages
): SsrResult {
  const { Component, title } = findPage(page.component, registry);

  const markup = renderToString(<Component props={page.props} />);

  return {
    head: [`<title inertia>${escapeHtmlAttribute(title(page.props))}</title>`],
    body: `<div id="app" data-page="${pageToHtmlAttribute(page)}">${markup}</div>`,
  };
}
