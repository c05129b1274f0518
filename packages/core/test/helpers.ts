import { vi } from "vitest";
import type { InertiaBinding, LocationMode } from "../src/controller.js";
import type { Logger } from "../src/logger.js";
import type { Page } from "../src/types/page.js";
import type { PropertyTable } from "../src/types/props.js";
import type { RequestHeaders, TemporarySession } from "../src/types/request.js";

export type RecordedResponse =
  | { type: "page"; status: 200; page: Page; body: string }
  | { type: "html"; status: 200; html: string }
  | { type: "location"; status: 302 | 409; url: string; mode: LocationMode };

export type FakeBindingOptions = {
  headers?: RequestHeaders;
  url?: string;
  shared?: PropertyTable;
  session?: TemporarySession | null;
};

/**
 * Binding recording what the controller answers instead of writing HTTP.
 */
export function fakeBinding(
  options: FakeBindingOptions = {}
): InertiaBinding<RecordedResponse> {
  return {
    headers: options.headers ?? {},
    url: options.url ?? "/",
    sharedProps: () => options.shared ?? {},
    temporarySession: () => options.session ?? null,
    pageResponse: (page, body) => ({ type: "page", status: 200, page, body }),
    htmlResponse: (html) => ({ type: "html", status: 200, html }),
    locationResponse: (url, mode) => ({
      type: "location",
      status: mode === "conflict" ? 409 : 302,
      url,
      mode,
    }),
  };
}

export function fakeLogger() {
  return {
    info: vi.fn<Logger["info"]>(),
    warn: vi.fn<Logger["warn"]>(),
    error: vi.fn<Logger["error"]>(),
  };
}

/**
 * A fetch that only settles when its request is aborted.
 */
export function hangingFetch(_url: string, init?: RequestInit): Promise<Response> {
  return new Promise<Response>((_resolve, reject) => {
    init?.signal?.addEventListener("abort", () => {
      reject(new Error("The operation was aborted."));
    });
  });
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}
