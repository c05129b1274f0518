/**
 * @fileoverview HTTP surface of the SSR renderer
 *
 * ENDPOINTS:
 * - POST /render    body: Page JSON, answer: { head: string[], body: string }
 * - GET  /health    liveness probe
 * - GET  /shutdown  answers, then asks the host to exit
 */

import express from "express";
import type { NextFunction, Request, Response } from "express";
import {
  InertiaError,
  describeError,
  isPage,
  type Logger,
} from "@inertia-node/core";
import { pages, type PageModule } from "./pages/index.js";
import { renderPage } from "./render.js";

export const LOG_TAG = "[renderer]";

export const rendererLogger: Logger = {
  info: (message, ...details) => console.log(`${LOG_TAG} ${message}`, ...details),
  warn: (message, ...details) => console.warn(`${LOG_TAG} ${message}`, ...details),
  error: (message, ...details) =>
    console.error(`${LOG_TAG} ${message}`, ...details),
};

export type RendererAppOptions = {
  /** Called once the shutdown answer has been sent */
  onShutdown: () => void;
  registry?: Readonly<Record<string, PageModule>>;
  logger?: Logger;
};

export function createRendererApp(options: RendererAppOptions): express.Express {
  const { onShutdown, registry = pages, logger = rendererLogger } = options;
  const app = express();

  app.use(express.json({ limit: "5mb" }));

  app.post("/render", (req: Request, res: Response) => {
    const page: unknown = req.body;

    if (!isPage(page)) {
      res.status(400).json({
        code: "INVALID_PAGE",
        message: "Body must be a page object",
      });
      return;
    }

    try {
      res.status(200).json(renderPage(page, registry));
    } catch (error) {
      const status = error instanceof InertiaError ? error.status : 500;
      logger.error(`Failed to render ${page.component}: ${describeError(error)}`);
      res.status(status).json({ code: "RENDER_FAILED", message: describeError(error) });
    }
  });

  app.get("/health", (_req: Request, res: Response) => {
    res.status(200).json({
      status: "ok",
      uptimeSeconds: Math.floor(process.uptime()),
      timestamp: new Date().toISOString(),
    });
  });

  app.get("/shutdown", (_req: Request, res: Response) => {
    logger.info("Shutdown requested.");
    res.on("finish", onShutdown);
    res.status(200).json({ status: "shutting down" });
  });

  // Malformed JSON bodies land here from express.json()
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    res.status(400).json({ code: "INVALID_BODY", message: describeError(error) });
  });

  return app;
}
