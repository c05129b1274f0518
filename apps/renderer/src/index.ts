import { createRendererApp, rendererLogger } from "./app.js";
import { readPortArg } from "./args.js";

const port = readPortArg(process.argv);

const app = createRendererApp({
  onShutdown: () => {
    server.close(() => process.exit(0));
    server.closeAllConnections();
  },
});

const server = app.listen(port, "127.0.0.1", () => {
  rendererLogger.info(`SSR renderer listening at http://127.0.0.1:${port}`);
});
