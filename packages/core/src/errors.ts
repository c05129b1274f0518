/**
 * @fileoverview Error taxonomy for the Inertia protocol engine
 *
 * Every failure the engine can raise is an `InertiaError` carrying a
 * machine-readable `code` and the HTTP status a binding should answer with.
 *
 * PROPAGATION:
 * - HeaderError, SerializationError, RenderError: fatal to the request
 * - SsrError: recovered locally, the page falls back to client-side hydration
 * - ProcessError, ConfigError: fatal at startup, never raised per request
 */

// ============================================================================
// CONSTANTS
// ============================================================================

/**
 * Error codes used across the engine and its bindings.
 */
export const INERTIA_ERROR_CODES = {
  /** A value cannot be represented as JSON */
  SERIALIZATION: "INERTIA_SERIALIZATION",
  /** A protocol header holds characters that are not visible ASCII */
  HEADER: "INERTIA_HEADER",
  /** The SSR renderer was unreachable, timed out or answered garbage */
  SSR: "INERTIA_SSR",
  /** The root template could not be rendered */
  RENDER: "INERTIA_RENDER",
  /** The renderer process could not be started */
  PROCESS: "INERTIA_PROCESS",
  /** Invalid configuration given at startup */
  CONFIG: "INERTIA_CONFIG",
} as const;

export type InertiaErrorCode =
  (typeof INERTIA_ERROR_CODES)[keyof typeof INERTIA_ERROR_CODES];

// ============================================================================
// ERROR CLASSES
// ============================================================================

/**
 * Base class of every error raised by the engine.
 *
 * @example
 * try {
 *   await inertia.render(binding, "Users/Index");
 * } catch (error) {
 *   if (error instanceof InertiaError) {
 *     res.status(error.status).json({ code: error.code, message: error.message });
 *   }
 * }
 */
export class InertiaError extends Error {
  readonly code: InertiaErrorCode;
  readonly status: number;

  constructor(
    code: InertiaErrorCode,
    message: string,
    status: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "InertiaError";
    this.code = code;
    this.status = status;
  }
}

export class SerializationError extends InertiaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(INERTIA_ERROR_CODES.SERIALIZATION, message, 500, options);
    this.name = "SerializationError";
  }
}

export class HeaderError extends InertiaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(INERTIA_ERROR_CODES.HEADER, message, 400, options);
    this.name = "HeaderError";
  }
}

export class SsrError extends InertiaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(INERTIA_ERROR_CODES.SSR, message, 502, options);
    this.name = "SsrError";
  }
}

export class RenderError extends InertiaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(INERTIA_ERROR_CODES.RENDER, message, 500, options);
    this.name = "RenderError";
  }
}

export class ProcessError extends InertiaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(INERTIA_ERROR_CODES.PROCESS, message, 500, options);
    this.name = "ProcessError";
  }
}

export class ConfigError extends InertiaError {
  constructor(message: string) {
    super(INERTIA_ERROR_CODES.CONFIG, message, 500);
    this.name = "ConfigError";
  }
}

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Extracts a printable message from anything that was thrown.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
