/**
 * @fileoverview Build manifest reader for asset discovery
 *
 * The client bundler writes files with content hashes in their names
 * ("app.3f2a91c0.js") and a manifest.json mapping logical names to them:
 *
 * {
 *   "app.js": "/assets/app.3f2a91c0.js",
 *   "app.css": "/assets/app.abc123.css"
 * }
 *
 * The root template links the hashed files through `@inertia::assets`, and
 * the manifest hash doubles as the asset version: a rebuild changes the
 * manifest, which changes the version, which forces stale clients to reload.
 */

import { createHash } from "crypto";
import { readFileSync } from "fs";
import fs from "fs/promises";
import path from "path";
import { ConfigError, RenderError } from "../errors.js";

// ============================================================================
// TYPES
// ============================================================================

/**
 * Keys are logical names (e.g. "app.js"), values are public paths.
 */
export type AssetManifest = Record<string, string>;

export type ResolvedAssets = {
  mainScript: string;
  /** May not exist in development */
  mainStyle: string | null;
};

export const MANIFEST_FILE = "manifest.json";

// ============================================================================
// VALIDATION
// ============================================================================

export function isAssetManifest(value: unknown): value is AssetManifest {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  return Object.values(value).every((entry) => typeof entry === "string");
}

// ============================================================================
// MANIFEST READER
// ============================================================================

type CachedManifest = { manifest: AssetManifest; readAt: number };

const cache = new Map<string, CachedManifest>();

// Development rereads every 5 seconds so rebuilds are picked up
const CACHE_TTL_MS = process.env.NODE_ENV === "production" ? Infinity : 5000;

/**
 * Reads and parses the manifest of a static directory.
 *
 * @throws RenderError if the file is missing or not a string map
 *
 * @example
 * const manifest = await readManifest("/app/public");
 * manifest["app.js"]; // "/assets/app.abc123.js"
 */
export async function readManifest(staticDir: string): Promise<AssetManifest> {
  const now = Date.now();
  const cached = cache.get(staticDir);

  if (cached && now - cached.readAt < CACHE_TTL_MS) {
    return cached.manifest;
  }

  const manifestPath = path.join(staticDir, MANIFEST_FILE);

  let content: string;
  try {
    content = await fs.readFile(manifestPath, "utf-8");
  } catch (error) {
    throw new RenderError(`Manifest file not found at ${manifestPath}.`, {
      cause: error,
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new RenderError(`Invalid JSON in manifest file at ${manifestPath}.`, {
      cause: error,
    });
  }

  if (!isAssetManifest(parsed)) {
    throw new RenderError(
      `Manifest file at ${manifestPath} must map names to paths.`
    );
  }

  cache.set(staticDir, { manifest: parsed, readAt: now });
  return parsed;
}

/**
 * Resolves the main script and stylesheet from the manifest.
 *
 * @throws RenderError if no main script is listed
 */
export async function resolveAssets(staticDir: string): Promise<ResolvedAssets> {
  const manifest = await readManifest(staticDir);

  const mainScript = manifest["app.js"] ?? manifest["main.js"];

  if (!mainScript) {
    const availableKeys = Object.keys(manifest).join(", ");
    throw new RenderError(
      `Could not find main script in manifest. Available entries: ${availableKeys || "(none)"}`
    );
  }

  const mainStyle = manifest["app.css"] ?? manifest["main.css"] ?? null;

  return { mainScript, mainStyle };
}

export function clearManifestCache(): void {
  cache.clear();
}

// ============================================================================
// VERSIONING
// ============================================================================

/**
 * Hashes the manifest into an asset version.
 *
 * Synchronous so it can serve as a version resolver.
 *
 * @throws ConfigError if the manifest cannot be read
 *
 * @example
 * createVersionState(() => manifestVersion("public"));
 */
export function manifestVersion(staticDir: string): string {
  const manifestPath = path.join(staticDir, MANIFEST_FILE);

  let content: Buffer;
  try {
    content = readFileSync(manifestPath);
  } catch (error) {
    throw new ConfigError(
      `Cannot compute the asset version, ${manifestPath} is not readable: ${
        error instanceof Error ? error.message : String(error)
      }`
    );
  }

  return createHash("md5").update(content).digest("hex");
}
