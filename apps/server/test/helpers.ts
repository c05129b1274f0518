import { vi } from "vitest";
import type { Logger } from "@inertia-node/core";

export function fakeLogger() {
  return {
    info: vi.fn<Logger["info"]>(),
    warn: vi.fn<Logger["warn"]>(),
    error: vi.fn<Logger["error"]>(),
  };
}
