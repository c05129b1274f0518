/**
 * @fileoverview Inertia setup of the example application
 */

import {
  Inertia,
  createInertiaConfig,
  createTemplateResolver,
  manifestVersion,
  type FetchLike,
  type Logger,
  type SsrOptions,
  type VersionResolution,
} from "@inertia-node/core";
import type { FlashStore } from "./flash.js";
import { readSessionId } from "./requestContext.js";

export type AppInertiaOptions = {
  appUrl: string;
  flash: FlashStore;
  staticDir: string;
  templatePath: string;
  ssr: SsrOptions | false;
  /** Literal version; the manifest hash is used when absent */
  version?: string;
  versionResolution?: VersionResolution;
  logger?: Logger;
  fetch?: FetchLike;
};

export function createInertia(options: AppInertiaOptions): Inertia {
  const { flash, staticDir } = options;

  const config = createInertiaConfig({
    url: options.appUrl,
    version: options.version ?? (() => manifestVersion(staticDir)),
    templatePath: options.templatePath,
    templateResolver: createTemplateResolver({ staticDir }),
    viewProps: { lang: "en" },
    ssr: options.ssr,
    reflashSession: (session, request) => {
      const sessionId = readSessionId(request.headers);
      if (!sessionId) {
        throw new Error(`No session cookie on ${request.url}`);
      }
      flash.put(sessionId, session);
    },
    ...(options.versionResolution ? { versionResolution: options.versionResolution } : {}),
    ...(options.logger ? { logger: options.logger } : {}),
    ...(options.fetch ? { fetch: options.fetch } : {}),
  });

  return new Inertia(config);
}
