import path from "path";
import { fileURLToPath } from "url";

// Resolve absolute paths the same way from tsx (apps/server/src/server)
// and from the compiled output (dist/apps/server/src/server)
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// apps/server/src/server -> apps/server
const serverRootDir = path.resolve(__dirname, "..", "..");

export const staticDir = path.join(serverRootDir, "public");
export const templatePath = path.join(serverRootDir, "www", "root.html");

export const DEFAULT_RENDERER_SCRIPT = path.resolve(
  serverRootDir,
  "..",
  "renderer",
  "src",
  "index.ts"
);
