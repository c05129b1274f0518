/**
 * @fileoverview Inertia middleware for Express
 *
 * Runs before every Inertia route and prepares what the controller reads
 * from the request:
 *
 * 1. TEMPORARY SESSION - flash data (validation errors, previous URL) read
 *    once from the host's session store
 * 2. SHARED PROPS - props every page receives; the controller adds flashed
 *    errors to them as an always prop named `errors`
 * 3. REDIRECT STATUS - a 301/302 answering PUT, PATCH or DELETE becomes a
 *    303, so the browser follows it with GET
 *
 * ORDER MATTERS:
 * Register it after the session/cookie middleware it reads from and before
 * the routes.
 */

import type { NextFunction, Request, Response } from "express";
import type {
  Inertia,
  PropertyTable,
  TemporarySession,
} from "@inertia-node/core";
import { setInertiaContext } from "./context.js";

// ============================================================================
// TYPES
// ============================================================================

export type SharedPropsProvider = (
  req: Request
) => PropertyTable | Promise<PropertyTable>;

export type TemporarySessionReader = (
  req: Request
) => TemporarySession | null | Promise<TemporarySession | null>;

export type InertiaMiddlewareOptions = {
  sharedProps?: SharedPropsProvider;
  temporarySession?: TemporarySessionReader;
};

// ============================================================================
// REDIRECT STATUS
// ============================================================================

const METHODS_SEEING_OTHER = new Set(["PUT", "PATCH", "DELETE"]);

/**
 * The status a redirect should carry for a request method.
 *
 * @example
 * redirectStatus("PUT", 302) // 303
 * redirectStatus("GET", 302) // 302
 */
export function redirectStatus(method: string, status: number): number {
  if ((status === 301 || status === 302) && METHODS_SEEING_OTHER.has(method)) {
    return 303;
  }
  return status;
}

function rewriteRedirects(req: Request, res: Response): void {
  const redirect: (status: number, url: string) => void = res.redirect;

  res.redirect = (first: string | number, second?: string | number): void => {
    const status =
      typeof first === "number" ? first : typeof second === "number" ? second : 302;
    const url = typeof first === "string" ? first : String(second);

    redirect.call(res, redirectStatus(req.method, status), url);
  };
}

// ============================================================================
// MIDDLEWARE
// ============================================================================

/**
 * @example
 * app.use(inertiaMiddleware(inertia, {
 *   sharedProps: (req) => ({ auth: alwaysProp({ user: req.user ?? null }) }),
 *   temporarySession: (req) => flash.take(sessionId(req)),
 * }));
 */
export function inertiaMiddleware(
  inertia: Inertia,
  options: InertiaMiddlewareOptions = {}
) {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const session = options.temporarySession
        ? await options.temporarySession(req)
        : null;
      const shared = options.sharedProps ? await options.sharedProps(req) : {};

      setInertiaContext(req, { inertia, sharedProps: shared, session });

      rewriteRedirects(req, res);
      next();
    } catch (error) {
      next(error);
    }
  };
}
