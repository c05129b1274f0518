/**
 * @fileoverview Lifecycle of the external SSR renderer process
 *
 * The renderer is a separate Node.js program (see apps/renderer) listening on
 * its own address. This module owns it:
 *
 * - start: validate the script path, spawn the runtime, wait until the OS
 *   reports the process as spawned
 * - stop: ask the renderer to exit through `GET /shutdown`; if that request
 *   fails, kill the process
 *
 * OWNERSHIP:
 * A `RendererHandle` only exposes the renderer's address. The child process
 * stays private to this module and is released exactly once: the first
 * `stop` takes it, later calls do nothing.
 *
 * ORDERING:
 * Call `stop` only after the HTTP server stopped accepting connections, so no
 * in-flight SSR call loses its renderer (see `startServer` in the Express
 * package).
 */

import { spawn as spawnChild } from "child_process";
import fs from "fs/promises";
import path from "path";
import { ProcessError, describeError } from "../errors.js";
import { consoleLogger, type Logger } from "../logger.js";
import { fetchWithTimeout, type FetchLike } from "../utils/http.js";

// ============================================================================
// TYPES
// ============================================================================

/**
 * The part of a ChildProcess the manager relies on.
 */
export type RendererChild = {
  readonly pid?: number | undefined;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: "spawn", listener: () => void): unknown;
  once(event: "error", listener: (error: Error) => void): unknown;
  once(
    event: "exit",
    listener: (code: number | null, signal: NodeJS.Signals | null) => void
  ): unknown;
};

export type SpawnFn = (command: string, args: readonly string[]) => RendererChild;

export type RendererProcessOptions = {
  /** Executable running the script, defaults to the current Node.js binary */
  runtime?: string;
  /** Arguments placed before the script path, e.g. ["--import", "tsx"] */
  runtimeArgs?: readonly string[];
  /** Bound of the graceful shutdown request */
  shutdownTimeoutMs?: number;
  spawn?: SpawnFn;
  fetch?: FetchLike;
  logger?: Logger;
};

export const SHUTDOWN_TIMEOUT_MS = 2000;

// ============================================================================
// HANDLE
// ============================================================================

const children = new WeakMap<RendererHandle, RendererChild>();

/**
 * A running renderer process.
 */
export class RendererHandle {
  /** Base URL of the renderer, e.g. "http://127.0.0.1:13714" */
  readonly address: string;
  readonly pid: number | undefined;

  constructor(child: RendererChild, address: string) {
    this.address = address;
    this.pid = child.pid;
    children.set(this, child);
  }

  /** True once `stop` has been called for this handle */
  get released(): boolean {
    return !children.has(this);
  }
}

// ============================================================================
// HELPERS
// ============================================================================

// NUL bytes and unpaired surrogates cannot be handed to the OS as a path
const INVALID_PATH_TEXT =
  /\0|[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

export function isWellFormedPath(value: string): boolean {
  return value.length > 0 && !INVALID_PATH_TEXT.test(value);
}

/**
 * Normalizes "host:port" or a full URL into a base URL without trailing slash.
 *
 * @example
 * toBaseUrl("127.0.0.1:13714") // "http://127.0.0.1:13714"
 */
export function toBaseUrl(bindAddress: string): string {
  const withScheme = /^[a-z][a-z\d+.-]*:\/\//i.test(bindAddress)
    ? bindAddress
    : `http://${bindAddress}`;

  let url: URL;
  try {
    url = new URL(withScheme);
  } catch (error) {
    throw new ProcessError(`Invalid renderer address "${bindAddress}".`, {
      cause: error,
    });
  }

  return `${url.protocol}//${url.host}`;
}

function waitForSpawn(child: RendererChild, scriptPath: string): Promise<void> {
  return new Promise((resolve, reject) => {
    let settled = false;

    child.once("spawn", () => {
      if (settled) return;
      settled = true;
      resolve();
    });

    child.once("error", (error) => {
      if (settled) return;
      settled = true;
      reject(
        new ProcessError(
          `Something went wrong on invoking the renderer ${scriptPath}: ${error.message}`,
          { cause: error }
        )
      );
    });
  });
}

const defaultSpawn: SpawnFn = (command, args) =>
  spawnChild(command, [...args], { stdio: "inherit" });

// ============================================================================
// MANAGER
// ============================================================================

/**
 * Starts and stops the renderer process.
 *
 * @example
 * const renderers = new RendererProcessManager({ runtimeArgs: ["--import", "tsx"] });
 * const handle = await renderers.start("apps/renderer/src/index.ts", "127.0.0.1:13714");
 * // ... serve requests, then after the HTTP server closed:
 * await renderers.stop(handle);
 */
export class RendererProcessManager {
  private readonly runtime: string;
  private readonly runtimeArgs: readonly string[];
  private readonly shutdownTimeoutMs: number;
  private readonly spawn: SpawnFn;
  private readonly fetch: FetchLike | undefined;
  private readonly logger: Logger;

  constructor(options: RendererProcessOptions = {}) {
    this.runtime = options.runtime ?? process.execPath;
    this.runtimeArgs = options.runtimeArgs ?? [];
    this.shutdownTimeoutMs = options.shutdownTimeoutMs ?? SHUTDOWN_TIMEOUT_MS;
    this.spawn = options.spawn ?? defaultSpawn;
    this.fetch = options.fetch;
    this.logger = options.logger ?? consoleLogger;
  }

  /**
   * Spawns the renderer script.
   *
   * @param scriptPath - Path of the renderer entry, e.g. "dist/ssr/ssr.js"
   * @param bindAddress - Address the renderer listens on; its port is passed
   * to the script as `--port <port>`
   * @throws ProcessError if the path is invalid or missing, or the runtime
   * cannot be spawned
   */
  async start(scriptPath: string, bindAddress: string): Promise<RendererHandle> {
    if (!isWellFormedPath(scriptPath)) {
      throw new ProcessError(
        "Invalid path: the renderer path contains characters that are not valid text."
      );
    }

    const scriptFile = path.resolve(scriptPath);

    try {
      await fs.access(scriptFile);
    } catch (error) {
      throw new ProcessError(
        `Invalid path: renderer script not found in ${scriptPath}.`,
        { cause: error }
      );
    }

    const address = toBaseUrl(bindAddress);
    const { port } = new URL(address);
    const args = [
      ...this.runtimeArgs,
      scriptFile,
      ...(port ? ["--port", port] : []),
    ];

    let child: RendererChild;
    try {
      child = this.spawn(this.runtime, args);
    } catch (error) {
      throw new ProcessError(
        `Something went wrong on invoking the renderer ${scriptPath}: ${describeError(error)}`,
        { cause: error }
      );
    }

    await waitForSpawn(child, scriptPath);

    const handle = new RendererHandle(child, address);

    child.once("exit", (code, signal) => {
      if (!handle.released) {
        this.logger.warn(
          `SSR renderer exited unexpectedly (code=${code} signal=${signal}).`
        );
      }
    });

    this.logger.info(`SSR renderer started (pid=${child.pid}) at ${address}`);
    return handle;
  }

  /**
   * Shuts the renderer down, gracefully if it answers, forcibly otherwise.
   */
  async stop(handle: RendererHandle): Promise<void> {
    const child = children.get(handle);
    if (!child) return;
    children.delete(handle);

    try {
      const response = await fetchWithTimeout(
        `${handle.address}/shutdown`,
        { method: "GET" },
        {
          timeoutMs: this.shutdownTimeoutMs,
          ...(this.fetch ? { fetch: this.fetch } : {}),
        }
      );

      if (!response.ok) {
        throw new Error(`HTTP ${response.status}`);
      }

      this.logger.info("SSR renderer shut down.");
    } catch (error) {
      this.logger.warn(
        `Graceful renderer shutdown failed, killing pid=${handle.pid}. ${describeError(error)}`
      );
      child.kill("SIGKILL");
    }
  }

  /**
   * Probes `GET /health` on the renderer.
   */
  async isHealthy(handle: RendererHandle): Promise<boolean> {
    if (handle.released) return false;

    try {
      const response = await fetchWithTimeout(
        `${handle.address}/health`,
        { method: "GET" },
        {
          timeoutMs: this.shutdownTimeoutMs,
          ...(this.fetch ? { fetch: this.fetch } : {}),
        }
      );
      return response.ok;
    } catch {
      return false;
    }
  }
}
