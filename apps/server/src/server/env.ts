/**
 * @fileoverview Environment parsing for the example server
 *
 * VARIABLES:
 * - PORT         HTTP port, default 3000
 * - APP_URL      public URL, default http://localhost:<PORT>
 * - SSR_ENABLED  "true" or "1" starts the renderer and enables SSR
 * - SSR_PORT     renderer port, default 13714
 * - SSR_SCRIPT   renderer entry, default apps/renderer/src/index.ts
 */

type Env = Readonly<Record<string, string | undefined>>;

export function getPort(
  defaultPort = 3000,
  name = "PORT",
  env: Env = process.env
): number {
  const raw = env[name];

  if (raw == null || raw.trim() === "") {
    return defaultPort;
  }

  const port = Number(raw);

  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(
      `Invalid ${name} value "${raw}". Expected an integer between 1 and 65535.`,
    );
  }

  return port;
}

export function getFlag(name: string, env: Env = process.env): boolean {
  const raw = env[name]?.trim().toLowerCase();
  return raw === "true" || raw === "1";
}

export function getString(
  name: string,
  defaultValue: string,
  env: Env = process.env
): string {
  const raw = env[name];
  return raw == null || raw.trim() === "" ? defaultValue : raw.trim();
}
