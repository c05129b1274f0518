import crypto from "crypto";
import type { Request, Response, NextFunction } from "express";
import { rawHeader, type RequestHeaders } from "@inertia-node/core";

export type RequestContext = {
  sessionId: string;
  userId: string | null;
};

export const REQUEST_ID_HEADER = "X-Request-Id";

export const SESSION_COOKIE = "session";

const contexts = new WeakMap<Request, RequestContext>();

export function readSessionId(headers: RequestHeaders): string | null {
  const cookie = rawHeader(headers, "cookie") ?? "";
  const sessionMatch = cookie.match(/(?:^|;\s*)session=([^;]+)/);
  return sessionMatch?.[1] ?? null;
}

function readUserId(headers: RequestHeaders): string | null {
  // A bearer token stands for a signed-in user in this example
  const auth = rawHeader(headers, "authorization")?.trim() ?? "";
  const match = auth.match(/^Bearer\s+(.+)$/i);
  return match?.[1] ?? null;
}

/**
 * Assigns a request id and a session cookie to every request. The id is
 * echoed in the X-Request-Id response header.
 */
export function requestContext() {
  return (req: Request, res: Response, next: NextFunction): void => {
    let sessionId = readSessionId(req.headers);

    if (!sessionId) {
      sessionId = crypto.randomUUID();
      res.cookie(SESSION_COOKIE, sessionId, { httpOnly: true, sameSite: "lax" });
    }

    res.setHeader(REQUEST_ID_HEADER, crypto.randomUUID());

    contexts.set(req, {
      sessionId,
      userId: readUserId(req.headers),
    });

    next();
  };
}

export function getRequestContext(req: Request): RequestContext {
  const context = contexts.get(req);
  if (!context) {
    throw new Error("requestContext() middleware must run before the routes.");
  }
  return context;
}
