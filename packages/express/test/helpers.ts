import { vi } from "vitest";
import { escapeHtmlAttribute, type Logger } from "@inertia-node/core";

export function fakeLogger() {
  return {
    info: vi.fn<Logger["info"]>(),
    warn: vi.fn<Logger["warn"]>(),
    error: vi.fn<Logger["error"]>(),
  };
}

/** A value as it appears inside the data-page attribute */
export function escaped(value: unknown): string {
  return escapeHtmlAttribute(JSON.stringify(value));
}
