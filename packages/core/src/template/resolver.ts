/**
 * @fileoverview Root template resolver
 *
 * The root template is plain HTML with these directives:
 *
 * - `@inertia::head`       SSR head elements, empty without SSR
 * - `@inertia::body`       SSR markup, or the app container carrying the page
 * - `@inertia::assets`     script and stylesheet tags from the build manifest
 * - `@inertia::view.<key>` a view prop, HTML escaped, empty when unset
 *
 * Directives are replaced in a single pass, so text inside props or
 * pre-rendered markup is never read as a directive.
 */

import fs from "fs/promises";
import path from "path";
import { RenderError, describeError } from "../errors.js";
import { escapeHtmlAttribute, pageToHtmlAttribute } from "../page.js";
import type { JsonObject } from "../types/json.js";
import type { Page, TemplateResolver, ViewData } from "../types/page.js";
import { resolveAssets, type ResolvedAssets } from "./manifest.js";

// ============================================================================
// TYPES
// ============================================================================

export type TemplateResolverOptions = {
  /** Directory holding manifest.json */
  staticDir: string;
  /** Keep templates in memory after the first read, defaults to true */
  cache?: boolean;
};

const DIRECTIVE = /@inertia::(head|body|assets|view\.([A-Za-z_$][\w$]*))/g;
const ASSETS_DIRECTIVE = "@inertia::assets";

// ============================================================================
// RENDERING
// ============================================================================

/**
 * The container the client hydrates when no SSR markup exists.
 *
 * @example
 * appContainer(page);
 * // <div id="app" data-page="{&quot;component&quot;:...}"></div>
 */
export function appContainer(page: Page): string {
  return `<div id="app" data-page="${pageToHtmlAttribute(page)}"></div>`;
}

export function assetTags(assets: ResolvedAssets): string {
  const tags: string[] = [];

  if (assets.mainStyle) {
    tags.push(
      `<link rel="stylesheet" href="${escapeHtmlAttribute(assets.mainStyle)}">`
    );
  }
  tags.push(
    `<script type="module" src="${escapeHtmlAttribute(assets.mainScript)}"></script>`
  );

  return tags.join("\n");
}

function viewValue(viewProps: JsonObject, key: string): string {
  if (!Object.hasOwn(viewProps, key)) return "";

  const value = viewProps[key];
  if (value === undefined || value === null) return "";
  return escapeHtmlAttribute(
    typeof value === "object" ? JSON.stringify(value) : String(value)
  );
}

/**
 * Replaces the directives of a template.
 */
export function fillTemplate(
  template: string,
  view: ViewData,
  assets: ResolvedAssets | null
): string {
  const { page, ssr } = view;

  return template.replace(
    DIRECTIVE,
    (_match, directive: string, viewKey: string | undefined) => {
      if (viewKey !== undefined) {
        return viewValue(view.viewProps, viewKey);
      }

      switch (directive) {
        case "head":
          return ssr ? ssr.head.join("\n") : "";
        case "body":
          return ssr ? ssr.body : appContainer(page);
        default:
          return assets ? assetTags(assets) : "";
      }
    }
  );
}

// ============================================================================
// FACTORY
// ============================================================================

/**
 * Creates a template resolver reading templates from disk.
 *
 * @example
 * const templateResolver = createTemplateResolver({ staticDir: "public" });
 * const html = await templateResolver("www/root.html", { page, ssr: null, viewProps: {} });
 */
export function createTemplateResolver(
  options: TemplateResolverOptions
): TemplateResolver {
  const { staticDir, cache = true } = options;
  const templates = new Map<string, string>();

  async function load(templatePath: string): Promise<string> {
    const file = path.resolve(templatePath);
    const cached = templates.get(file);
    if (cached !== undefined) return cached;

    let template: string;
    try {
      template = await fs.readFile(file, "utf-8");
    } catch (error) {
      throw new RenderError(
        `Failed to open root layout at ${templatePath}: ${describeError(error)}`,
        { cause: error }
      );
    }

    if (cache) templates.set(file, template);
    return template;
  }

  return async (templatePath, view) => {
    const template = await load(templatePath);

    const assets = template.includes(ASSETS_DIRECTIVE)
      ? await resolveAssets(staticDir)
      : null;

    return fillTemplate(template, view, assets);
  };
}
