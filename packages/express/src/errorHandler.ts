import type { NextFunction, Request, Response } from "express";
import { InertiaError, consoleLogger, type Logger } from "@inertia-node/core";

export const INTERNAL_ERROR_CODE = "INTERNAL_ERROR";

/**
 * Turns errors forwarded with `next(error)` into `{ code, message }` JSON.
 *
 * Engine errors keep their status (400 for a malformed header, 500 for a
 * failed template). Anything else is a 500 with a generic message.
 */
export function inertiaErrorHandler(logger: Logger = consoleLogger) {
  return (
    error: unknown,
    req: Request,
    res: Response,
    next: NextFunction
  ): void => {
    if (res.headersSent) {
      next(error);
      return;
    }

    if (error instanceof InertiaError) {
      if (error.status >= 500) {
        logger.error(`${req.method} ${req.originalUrl} failed: ${error.message}`);
      }
      res.status(error.status).json({ code: error.code, message: error.message });
      return;
    }

    logger.error(`${req.method} ${req.originalUrl} failed`, error);
    res.status(500).json({
      code: INTERNAL_ERROR_CODE,
      message: "Internal server error",
    });
  };
}
