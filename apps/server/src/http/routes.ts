/**
 * @fileoverview Routes of the example application
 *
 * ROUTES:
 * - GET  /          Index, data props
 * - GET  /contact   Contact, an always prop plus flashed form errors
 * - POST /contact   validates the form, flashes errors, redirects back
 * - PUT  /contact   same handler, its redirect becomes a 303
 * - GET  /events    Events/Index, lazy and on-demand props
 * - GET  /foo       Foo/Index through the route helper
 * - GET  /docs      external redirect
 * - GET  /health    health check for load balancers
 */

import express from "express";
import type { Express, NextFunction, Request, Response } from "express";
import {
  alwaysProp,
  dataProp,
  lazyProp,
  onDemandProp,
  type JsonObject,
} from "@inertia-node/core";
import { inertiaPage, location, render } from "@inertia-node/express";
import { CATEGORIES, listEvents, readRadioStatus } from "../server/events.js";
import type { FlashStore } from "../server/flash.js";
import { getRequestContext } from "../server/requestContext.js";

export const DOCS_URL = "https://inertiajs.com";

const MAX_MESSAGE_LENGTH = 500;

/**
 * Validates the contact form. Returns the errors by field, empty when valid.
 */
export function validateContact(body: unknown): JsonObject {
  const message =
    typeof body === "object" && body !== null && "message" in body
      ? body.message
      : undefined;

  if (typeof message !== "string" || message.trim() === "") {
    return { message: "The message field is required." };
  }
  if (message.length > MAX_MESSAGE_LENGTH) {
    return { message: `The message may not be longer than ${MAX_MESSAGE_LENGTH} characters.` };
  }
  return {};
}

export function registerRoutes(app: Express, flash: FlashStore): void {
  app.get("/", async (req: Request, res: Response, next: NextFunction) => {
    try {
      await render(req, res, "Index", {
        message: dataProp("This message is sent from the server!"),
      });
    } catch (error) {
      next(error);
    }
  });

  app.get("/contact", async (req: Request, res: Response, next: NextFunction) => {
    try {
      await render(req, res, "Contact", {
        user: alwaysProp({ name: "John Doe", email: "johndoe@example.com" }),
      });
    } catch (error) {
      next(error);
    }
  });

  const submitContact = (req: Request, res: Response): void => {
    const errors = validateContact(req.body);

    if (Object.keys(errors).length > 0) {
      const { sessionId } = getRequestContext(req);
      flash.flashErrors(sessionId, errors, req.originalUrl);
    }

    res.redirect("/contact");
  };

  app
    .route("/contact")
    .post(express.urlencoded({ extended: false }), submitContact)
    .put(express.urlencoded({ extended: false }), submitContact);

  app.get(
    "/events",
    inertiaPage("Events/Index", {
      categories: dataProp(CATEGORIES),
      events: lazyProp(() => listEvents()),
      radioStatus: onDemandProp(() => readRadioStatus()),
    })
  );

  app.get("/foo", inertiaPage("Foo/Index"));

  app.get("/docs", (req: Request, res: Response, next: NextFunction) => {
    try {
      location(req, res, DOCS_URL);
    } catch (error) {
      next(error);
    }
  });

  app.get("/health", (_req: Request, res: Response) => {
    res.status(200).json({
      status: "ok",
      uptimeSeconds: Math.floor(process.uptime()),
      timestamp: new Date().toISOString(),
    });
  });
}
