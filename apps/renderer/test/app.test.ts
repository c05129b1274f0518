import { createElement } from "react";
import type { AddressInfo } from "net";
import type { Server } from "http";
import { afterAll, beforeAll, describe, expect, it, vi } from "vitest";
import type { Logger } from "@inertia-node/core";
import { createRendererApp } from "../src/app.js";
import { DEFAULT_RENDERER_PORT, readPortArg } from "../src/args.js";
import type { PageModule } from "../src/pages/index.js";

const Plain: PageModule = {
  Component: () => createElement("p", null, "plain"),
  title: () => "Plain",
};

const logger = {
  info: vi.fn<Logger["info"]>(),
  warn: vi.fn<Logger["warn"]>(),
  error: vi.fn<Logger["error"]>(),
};
const onShutdown = vi.fn();

let server: Server;
let baseUrl = "";

beforeAll(async () => {
  const app = createRendererApp({ onShutdown, registry: { Plain }, logger });
  server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
  });
  const address: AddressInfo | string | null = server.address();
  baseUrl = `http://127.0.0.1:${typeof address === "object" && address ? address.port : 0}`;
});

afterAll(async () => {
  await new Promise<void>((resolve) => server.close(() => resolve()));
});

function post(path: string, body: string) {
  return fetch(`${baseUrl}${path}`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body,
  });
}

describe("POST /render", () => {
  it("answers with head and body", async () => {
    const page = { component: "Plain", props: {}, url: "/plain", version: "v1" };

    const response = await post("/render", JSON.stringify(page));

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      head: ["<title inertia>Plain</title>"],
      body: '<div id="app" data-page="{&quot;component&quot;:&quot;Plain&quot;,&quot;props&quot;:{},&quot;url&quot;:&quot;/plain&quot;,&quot;version&quot;:&quot;v1&quot;}"><p>plain</p></div>',
    });
  });

  it("rejects a body that is not a page", async () => {
    const response = await post("/render", JSON.stringify({ component: "Plain" }));

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      code: "INVALID_PAGE",
      message: "Body must be a page object",
    });
  });

  it("rejects malformed JSON", async () => {
    const response = await post("/render", "{not json");

    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({ code: "INVALID_BODY" });
  });

  it("reports unknown components", async () => {
    const page = { component: "Ghost", props: {}, url: "/", version: "v1" };

    const response = await post("/render", JSON.stringify(page));

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({
      code: "RENDER_FAILED",
      message: 'Unknown page component "Ghost".',
    });
    expect(logger.error).toHaveBeenCalledWith(
      'Failed to render Ghost: Unknown page component "Ghost".'
    );
  });
});

describe("GET /health", () => {
  it("reports the renderer as up", async () => {
    const response = await fetch(`${baseUrl}/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ status: "ok" });
  });
});

describe("GET /shutdown", () => {
  it("answers before asking the host to exit", async () => {
    const response = await fetch(`${baseUrl}/shutdown`);

    expect(await response.json()).toEqual({ status: "shutting down" });
    await vi.waitFor(() => expect(onShutdown).toHaveBeenCalledTimes(1));
  });
});

describe("readPortArg", () => {
  it("reads the port after --port", () => {
    expect(readPortArg(["node", "index.js", "--port", "13715"])).toBe(13715);
  });

  it("falls back to the default port", () => {
    expect(readPortArg(["node", "index.js"])).toBe(DEFAULT_RENDERER_PORT);
  });

  it.each([["0"], ["70000"], ["abc"], ["1.5"]])("rejects %s", (raw) => {
    expect(() => readPortArg(["--port", raw])).toThrow(
      `Invalid --port value "${raw}". Expected an integer between 1 and 65535.`
    );
  });

  it("rejects a missing value", () => {
    expect(() => readPortArg(["--port"])).toThrow(
      'Invalid --port value "". Expected an integer between 1 and 65535.'
    );
  });
});
