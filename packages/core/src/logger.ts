/**
 * @fileoverview Minimal logger contract used by the engine
 *
 * The engine logs through whatever object it is given. By default that is
 * `console`, prefixed with an `[inertia]` tag so engine lines stand out in the
 * server output next to the request log.
 */

export type Logger = {
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
};

export const LOG_TAG = "[inertia]";

/**
 * Logger writing to the console with the engine tag.
 *
 * @example
 * consoleLogger.warn("Failed to reflash session");
 * // [inertia] Failed to reflash session
 */
export const consoleLogger: Logger = {
  info: (message, ...details) => console.log(`${LOG_TAG} ${message}`, ...details),
  warn: (message, ...details) => console.warn(`${LOG_TAG} ${message}`, ...details),
  error: (message, ...details) =>
    console.error(`${LOG_TAG} ${message}`, ...details),
};
