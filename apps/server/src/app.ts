import express from "express";
import path from "path";
import { alwaysProp, lazyProp, type Inertia, type Logger } from "@inertia-node/core";
import {
  inertiaErrorHandler,
  inertiaMiddleware,
  requestLogger,
} from "@inertia-node/express";
import { registerRoutes } from "./http/routes.js";
import type { FlashStore } from "./server/flash.js";
import { getRequestContext, requestContext } from "./server/requestContext.js";

export const APP_VERSION = "0.1.0";

export type AppOptions = {
  inertia: Inertia;
  flash: FlashStore;
  staticDir: string;
  logRequests?: boolean;
  logger?: Logger;
};

export function createApp(options: AppOptions): express.Express {
  const { inertia, flash, staticDir, logRequests = true } = options;
  const app = express();

  if (logRequests) {
    app.use(requestLogger());
  }

  app.use(
    express.static(staticDir, {
      index: false,
      setHeaders(res, filePath) {
        // Cache hashed assets aggressively
        if (filePath.includes(`${path.sep}assets${path.sep}`)) {
          res.setHeader("Cache-Control", "public, max-age=31536000, immutable");
          return;
        }

        res.setHeader("Cache-Control", "public, max-age=3600");
      },
    }),
  );

  app.use(requestContext());

  app.use(
    inertiaMiddleware(inertia, {
      sharedProps: (req) => ({
        version: alwaysProp(APP_VERSION),
        assetsVersion: lazyProp(() => inertia.version),
        auth: alwaysProp({ user: getRequestContext(req).userId }),
      }),
      temporarySession: (req) => flash.take(getRequestContext(req).sessionId),
    }),
  );

  registerRoutes(app, flash);

  app.use((req: express.Request, res: express.Response) => {
    res.status(404).json({
      code: "NOT_FOUND",
      message: `No route for ${req.method} ${req.path}`,
    });
  });

  app.use(inertiaErrorHandler(options.logger));

  return app;
}
