/**
 * @fileoverview Route-level helpers
 */

import type { NextFunction, Request, Response } from "express";
import { ConfigError, type PropertyTable } from "@inertia-node/core";
import { expressBinding } from "./binding.js";
import { getInertiaContext, type InertiaContext } from "./context.js";

export type PropsFactory = (
  req: Request
) => PropertyTable | Promise<PropertyTable>;

function requireContext(req: Request): InertiaContext {
  const context = getInertiaContext(req);
  if (!context) {
    throw new ConfigError(
      `No Inertia context for ${req.method} ${req.originalUrl}. Register inertiaMiddleware() before the routes.`
    );
  }
  return context;
}

/**
 * Answers the request with a page.
 *
 * @example
 * app.get("/contact", async (req, res, next) => {
 *   try {
 *     await render(req, res, "Contact", { user: alwaysProp({ name: "Ada" }) });
 *   } catch (error) {
 *     next(error);
 *   }
 * });
 */
export async function render(
  req: Request,
  res: Response,
  component: string,
  props: PropertyTable = {}
): Promise<void> {
  const { inertia } = requireContext(req);
  await inertia.render(expressBinding(req, res), component, props);
}

/**
 * Redirects to a URL outside the Inertia application.
 */
export function location(req: Request, res: Response, url: string): void {
  const { inertia } = requireContext(req);
  inertia.location(expressBinding(req, res), url);
}

/**
 * A GET handler rendering a component, with static props or props built
 * from the request.
 *
 * @example
 * app.get("/foo", inertiaPage("Foo/Index"));
 * app.get("/users/:id", inertiaPage("Users/Show", (req) => ({
 *   user: lazyProp(() => users.find(req.params.id)),
 * })));
 */
export function inertiaPage(
  component: string,
  props: PropertyTable | PropsFactory = {}
) {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const table = typeof props === "function" ? await props(req) : props;
      await render(req, res, component, table);
    } catch (error) {
      next(error);
    }
  };
}
