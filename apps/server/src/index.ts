import { RendererProcessManager } from "@inertia-node/core";
import { startServer } from "@inertia-node/express";
import { createApp } from "./app.js";
import { getFlag, getPort, getString } from "./server/env.js";
import { FlashStore } from "./server/flash.js";
import { createInertia } from "./server/inertia.js";
import {
  DEFAULT_RENDERER_SCRIPT,
  staticDir,
  templatePath,
} from "./server/paths.js";

const port = getPort();
const appUrl = getString("APP_URL", `http://localhost:${port}`);
const ssrEnabled = getFlag("SSR_ENABLED");
const ssrPort = getPort(13714, "SSR_PORT");
const ssrAddress = `127.0.0.1:${ssrPort}`;
const scriptPath = getString("SSR_SCRIPT", DEFAULT_RENDERER_SCRIPT);

const flash = new FlashStore();
const inertia = createInertia({
  appUrl,
  flash,
  staticDir,
  templatePath,
  ssr: ssrEnabled ? { url: `http://${ssrAddress}` } : false,
});

const app = createApp({ inertia, flash, staticDir });

// The renderer starts only once the listener is bound
const running = await startServer({
  app,
  port,
  ...(ssrEnabled
    ? {
        renderer: {
          manager: new RendererProcessManager({
            runtimeArgs: scriptPath.endsWith(".ts") ? ["--import", "tsx"] : [],
          }),
          scriptPath,
          address: ssrAddress,
        },
      }
    : {}),
});

console.log(`[server] ${appUrl} (SSR ${ssrEnabled ? "on" : "off"})`);

function stop(signal: NodeJS.Signals): void {
  console.log(`[server] ${signal} received, shutting down`);

  running.shutdown().then(
    () => {
      flash.destroy();
      process.exit(0);
    },
    (error: unknown) => {
      console.error("[server] Shutdown failed:", error);
      process.exit(1);
    },
  );
}

process.once("SIGINT", stop);
process.once("SIGTERM", stop);
