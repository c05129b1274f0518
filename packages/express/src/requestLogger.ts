/**
 * @fileoverview Request logging middleware
 *
 * OUTPUT FORMAT:
 * GET /events 200 12.34ms
 * GET /events 200 3.10ms (inertia partial: events)
 * POST /contact 303 4.56ms
 */

import type { NextFunction, Request, Response } from "express";
import { INERTIA_HEADERS, rawHeader } from "@inertia-node/core";

export type LogLine = (line: string) => void;

function describeInertia(req: Request): string {
  if (!rawHeader(req.headers, INERTIA_HEADERS.INERTIA)) return "";

  const partial = rawHeader(req.headers, INERTIA_HEADERS.PARTIAL_DATA);
  return partial ? ` (inertia partial: ${partial})` : " (inertia)";
}

/**
 * Logs every request with its status and duration once the response is sent.
 *
 * @example
 * app.use(requestLogger());
 */
export function requestLogger(log: LogLine = (line) => console.log(line)) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const start = process.hrtime.bigint();

    res.on("finish", () => {
      const durationMs = Number(process.hrtime.bigint() - start) / 1_000_000;
      log(
        `${req.method} ${req.originalUrl} ${res.statusCode} ${durationMs.toFixed(2)}ms${describeInertia(req)}`
      );
    });

    next();
  };
}
