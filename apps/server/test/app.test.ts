import type { AddressInfo } from "net";
import type { Server } from "http";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { startServer, type RunningServer } from "@inertia-node/express";
import { createRendererApp } from "@inertia-node/renderer/app";
import { APP_VERSION, createApp } from "../src/app.js";
import { DOCS_URL } from "../src/http/routes.js";
import { FlashStore } from "../src/server/flash.js";
import { createInertia } from "../src/server/inertia.js";
import { staticDir, templatePath } from "../src/server/paths.js";
import type { FetchLike, SsrOptions } from "@inertia-node/core";
import { fakeLogger } from "./helpers.js";

type TestServer = {
  running: RunningServer;
  flash: FlashStore;
  logger: ReturnType<typeof fakeLogger>;
  url: (path: string) => string;
};

async function startApp(
  ssr: SsrOptions | false = false,
  fetch?: FetchLike
): Promise<TestServer> {
  const flash = new FlashStore();
  const logger = fakeLogger();
  const inertia = createInertia({
    appUrl: "http://localhost:3000",
    flash,
    staticDir,
    templatePath,
    ssr,
    version: "v1",
    logger,
    ...(fetch ? { fetch } : {}),
  });

  const running = await startServer({
    app: createApp({ inertia, flash, staticDir, logRequests: false, logger }),
    port: 0,
    host: "127.0.0.1",
    logger,
  });

  return {
    running,
    flash,
    logger,
    url: (path) => `http://127.0.0.1:${running.port}${path}`,
  };
}

async function stopApp(app: TestServer): Promise<void> {
  await app.running.shutdown();
  app.flash.destroy();
}

const session = { Cookie: "session=test-session" };
const hydrated = { ...session, "X-Inertia": "true", "X-Inertia-Version": "v1" };

function postForm(url: string, body: string, method = "POST") {
  return fetch(url, {
    method,
    redirect: "manual",
    headers: { ...session, "Content-Type": "application/x-www-form-urlencoded" },
    body,
  });
}

describe("example application", () => {
  let app: TestServer;

  beforeAll(async () => {
    app = await startApp();
  });

  afterAll(async () => {
    await stopApp(app);
  });

  it("renders the root template with assets and the page container", async () => {
    const response = await fetch(app.url("/"), { headers: session });
    const html = await response.text();

    expect(response.status).toBe(200);
    expect(response.headers.get("vary")).toBe("X-Inertia");
    expect(html).toContain(
      '<link rel="stylesheet" href="/assets/app.css">\n<script type="module" src="/assets/app.js"></script>'
    );
    expect(html).toContain('<div id="app" data-page="{&quot;component&quot;:&quot;Index&quot;');
    expect(html).toContain('<html lang="en">');
    expect(html).toContain('<meta name="app-url" content="http://localhost:3000" />');
    expect(html).not.toContain("@inertia::");
  });

  it("sets a session cookie on the first visit", async () => {
    const response = await fetch(app.url("/"));

    expect(response.headers.get("set-cookie")).toMatch(/^session=[0-9a-f-]{36}; Path=\/; HttpOnly; SameSite=Lax$/);
  });

  it("tags every response with a request id", async () => {
    const first = await fetch(app.url("/health"));
    const second = await fetch(app.url("/health"));

    const firstId = first.headers.get("x-request-id");
    expect(firstId).toMatch(/^[0-9a-f-]{36}$/);
    expect(second.headers.get("x-request-id")).not.toBe(firstId);
  });

  it("sends shared and route props to hydrated clients", async () => {
    const response = await fetch(app.url("/events"), { headers: hydrated });

    expect(response.headers.get("x-inertia")).toBe("true");
    expect(await response.json()).toEqual({
      component: "Events/Index",
      props: {
        version: APP_VERSION,
        assetsVersion: "v1",
        auth: { user: null },
        categories: ["foo", "bar"],
        events: [
          { id: 80, title: "Release party", category: "foo" },
          { id: 81, title: "Protocol workshop", category: "bar" },
          { id: 82, title: "Hydration meetup", category: "foo" },
        ],
      },
      url: "/events",
      version: "v1",
    });
  });

  it("loads on-demand props only when a partial reload asks for them", async () => {
    const response = await fetch(app.url("/events"), {
      headers: {
        ...hydrated,
        "X-Inertia-Partial-Component": "Events/Index",
        "X-Inertia-Partial-Data": "radioStatus",
      },
    });

    const page: unknown = await response.json();
    expect(page).toEqual({
      component: "Events/Index",
      props: {
        version: APP_VERSION,
        auth: { user: null },
        radioStatus: { status: "on air", listeners: 42 },
      },
      url: "/events",
      version: "v1",
    });
  });

  it("shares the signed-in user", async () => {
    const response = await fetch(app.url("/foo"), {
      headers: { ...hydrated, Authorization: "Bearer test-user" },
    });

    expect(await response.json()).toMatchObject({
      component: "Foo/Index",
      props: { auth: { user: "test-user" } },
    });
  });

  it("shows flashed validation errors once after a failed submit", async () => {
    const submit = await postForm(app.url("/contact"), "message=");

    expect(submit.status).toBe(302);
    expect(submit.headers.get("location")).toBe("/contact");

    const first = await fetch(app.url("/contact"), { headers: hydrated });
    expect(await first.json()).toMatchObject({
      props: {
        user: { name: "John Doe", email: "johndoe@example.com" },
        errors: { message: "The message field is required." },
      },
    });

    const second = await fetch(app.url("/contact"), { headers: hydrated });
    const page: unknown = await second.json();
    expect(page).toMatchObject({ props: { user: { name: "John Doe" } } });
    expect(page).not.toHaveProperty("props.errors");
  });

  it("answers a PUT submit with 303", async () => {
    const response = await postForm(app.url("/contact"), "message=hello", "PUT");

    expect(response.status).toBe(303);
    expect(response.headers.get("location")).toBe("/contact");
  });

  it("keeps flashed errors across a forced refresh", async () => {
    await postForm(app.url("/contact"), "message=");

    const stale = await fetch(app.url("/contact"), {
      headers: { ...hydrated, "X-Inertia-Version": "old-build" },
    });
    expect(stale.status).toBe(409);
    expect(stale.headers.get("x-inertia-location")).toBe("/contact");

    const reloaded = await fetch(app.url("/contact"), { headers: hydrated });
    expect(await reloaded.json()).toMatchObject({
      props: { errors: { message: "The message field is required." } },
    });
  });

  it("sends hydrated clients to the docs with a conflict", async () => {
    const response = await fetch(app.url("/docs"), { headers: hydrated });

    expect(response.status).toBe(409);
    expect(response.headers.get("x-inertia-location")).toBe(DOCS_URL);
  });

  it("serves static files with cache headers", async () => {
    const response = await fetch(app.url("/manifest.json"));

    expect(response.status).toBe(200);
    expect(response.headers.get("cache-control")).toBe("public, max-age=3600");
  });

  it("answers unknown routes with a JSON 404", async () => {
    const response = await fetch(app.url("/nope"));

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({
      code: "NOT_FOUND",
      message: "No route for GET /nope",
    });
  });
});

describe("server-side rendering", () => {
  let renderer: Server;
  let rendererUrl = "";

  beforeAll(async () => {
    const rendererApp = createRendererApp({ onShutdown: () => {}, logger: fakeLogger() });
    renderer = await new Promise<Server>((resolve) => {
      const listening = rendererApp.listen(0, "127.0.0.1", () => resolve(listening));
    });
    const address: AddressInfo | string | null = renderer.address();
    rendererUrl = `http://127.0.0.1:${typeof address === "object" && address ? address.port : 0}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve) => renderer.close(() => resolve()));
  });

  it("puts the pre-rendered markup into the template", async () => {
    const app = await startApp({ url: rendererUrl });

    try {
      const html = await (await fetch(app.url("/contact"), { headers: session })).text();

      expect(html).toContain("<title inertia>My name is John Doe!</title>");
      expect(html).toContain("<em>johndoe@example.com</em>");
      expect(app.logger.warn).not.toHaveBeenCalled();
    } finally {
      await stopApp(app);
    }
  });

  it("falls back to client-side rendering when the renderer is unreachable", async () => {
    const failingFetch: FetchLike = async () => {
      throw new Error("connect ECONNREFUSED");
    };
    const app = await startApp({ url: "http://127.0.0.1:13714" }, failingFetch);

    try {
      const response = await fetch(app.url("/contact"), { headers: session });
      const html = await response.text();

      expect(response.status).toBe(200);
      expect(html).toContain('<div id="app" data-page="{&quot;component&quot;:&quot;Contact&quot;');
      expect(html).not.toContain("<title inertia>");
      expect(app.logger.warn).toHaveBeenCalledWith(
        "Error on server-side rendering page Contact. connect ECONNREFUSED"
      );
    } finally {
      await stopApp(app);
    }
  });
});

