export const DEFAULT_RENDERER_PORT = 13714;

/**
 * Reads `--port <n>` from the command line.
 *
 * @example
 * readPortArg(["node", "index.js", "--port", "13715"]) // 13715
 */
export function readPortArg(
  argv: readonly string[],
  defaultPort = DEFAULT_RENDERER_PORT
): number {
  const index = argv.indexOf("--port");
  if (index < 0) return defaultPort;

  const raw = argv[index + 1];
  const port = Number(raw);

  if (raw === undefined || !Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(
      `Invalid --port value "${raw ?? ""}". Expected an integer between 1 and 65535.`
    );
  }

  return port;
}
