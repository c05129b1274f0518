/**
 * @fileoverview Ordered startup and shutdown of the HTTP server and the
 * SSR renderer
 *
 * STARTUP:
 * 1. The HTTP listener binds its port
 * 2. The renderer process is spawned
 * If step 2 fails the listener is closed again before the error propagates,
 * so no half-started server lingers.
 *
 * SHUTDOWN:
 * 1. The listener stops accepting connections and drains in-flight requests
 * 2. Only then the renderer is asked to exit
 * A renderer stopped first would fail the SSR calls of requests still being
 * served.
 */

import http from "http";
import type { AddressInfo } from "net";
import {
  consoleLogger,
  type Logger,
  type RendererHandle,
  type RendererProcessManager,
} from "@inertia-node/core";

// ============================================================================
// TYPES
// ============================================================================

export type RendererLaunch = {
  manager: RendererProcessManager;
  /** Entry script of the renderer */
  scriptPath: string;
  /** Address the renderer listens on, e.g. "127.0.0.1:13714" */
  address: string;
};

export type StartServerOptions = {
  app: http.RequestListener;
  port: number;
  host?: string;
  renderer?: RendererLaunch;
  logger?: Logger;
};

export type RunningServer = {
  server: http.Server;
  /** Bound port, useful when listening on port 0 */
  port: number;
  renderer: RendererHandle | null;
  /** Idempotent: later calls return the first shutdown */
  shutdown(): Promise<void>;
};

// ============================================================================
// HELPERS
// ============================================================================

function listen(
  app: http.RequestListener,
  port: number,
  host: string
): Promise<http.Server> {
  return new Promise((resolve, reject) => {
    const server = http.createServer(app);
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      resolve(server);
    });
  });
}

function close(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

function boundPort(server: http.Server, fallback: number): number {
  const address: AddressInfo | string | null = server.address();
  return typeof address === "object" && address !== null ? address.port : fallback;
}

// ============================================================================
// LIFECYCLE
// ============================================================================

/**
 * @example
 * const running = await startServer({
 *   app,
 *   port: 3000,
 *   renderer: { manager: new RendererProcessManager(), scriptPath, address: "127.0.0.1:13714" },
 * });
 * process.once("SIGTERM", () => void running.shutdown());
 */
export async function startServer(options: StartServerOptions): Promise<RunningServer> {
  const { app, port, host = "0.0.0.0", renderer: launch } = options;
  const logger = options.logger ?? consoleLogger;

  const server = await listen(app, port, host);
  const actualPort = boundPort(server, port);
  logger.info(`Listening at http://${host}:${actualPort}`);

  let renderer: RendererHandle | null = null;

  if (launch) {
    try {
      renderer = await launch.manager.start(launch.scriptPath, launch.address);
    } catch (error) {
      logger.error("Renderer failed to start, closing the server.");
      await close(server);
      throw error;
    }
  }

  let stopping: Promise<void> | null = null;

  const shutdown = (): Promise<void> => {
    stopping ??= (async () => {
      try {
        await close(server);
        logger.info("Server closed.");
      } finally {
        // Runs even when closing fails
        if (launch && renderer) {
          await launch.manager.stop(renderer);
        }
      }
    })();
    return stopping;
  };

  return { server, port: actualPort, renderer, shutdown };
}
