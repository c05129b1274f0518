/**
 * @fileoverview Express implementation of the controller's binding
 */

import type { Request, Response } from "express";
import {
  INERTIA_HEADERS,
  PAGE_RESPONSE_HEADERS,
  type InertiaBinding,
} from "@inertia-node/core";
import { getInertiaContext } from "./context.js";

/**
 * Wraps an Express request/response pair for the controller.
 *
 * Shared props and the temporary session come from `inertiaMiddleware`;
 * without it the page gets neither.
 *
 * @example
 * await inertia.render(expressBinding(req, res), "Contact");
 */
export function expressBinding(req: Request, res: Response): InertiaBinding<void> {
  const context = getInertiaContext(req);

  return {
    headers: req.headers,
    url: req.originalUrl,

    sharedProps: () => context?.sharedProps ?? {},

    temporarySession: () => context?.session ?? null,

    pageResponse: (_page, body) => {
      res.status(200).set(PAGE_RESPONSE_HEADERS).type("json").send(body);
    },

    htmlResponse: (html) => {
      res.status(200).set("Vary", "X-Inertia").type("html").send(html);
    },

    locationResponse: (url, mode) => {
      if (mode === "conflict") {
        res.status(409).set(INERTIA_HEADERS.LOCATION, url).end();
        return;
      }
      res.redirect(302, url);
    },
  };
}
