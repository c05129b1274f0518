import express from "express";
import type { NextFunction, Request, Response } from "express";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import {
  HeaderError,
  Inertia,
  alwaysProp,
  appContainer,
  createInertiaConfig,
  dataProp,
  lazyProp,
} from "@inertia-node/core";
import {
  inertiaErrorHandler,
  inertiaMiddleware,
  inertiaPage,
  location,
  render,
  startServer,
  type RunningServer,
} from "../src/index.js";
import { escaped, fakeLogger } from "./helpers.js";

const logger = fakeLogger();

const inertia = new Inertia(
  createInertiaConfig({
    url: "http://localhost:3000",
    version: "v1",
    templatePath: "root.html",
    templateResolver: async (_path, view) => `<body>${appContainer(view.page)}</body>`,
    logger,
  })
);

function createTestApp() {
  const app = express();

  app.use(
    inertiaMiddleware(inertia, {
      sharedProps: () => ({ appName: alwaysProp("demo") }),
      temporarySession: (req) =>
        req.headers["x-test-flash"]
          ? { errors: { message: "Required" }, prevReqUrl: "/contact" }
          : null,
    })
  );

  app.get("/", inertiaPage("Index", { message: dataProp("hi") }));

  app.get(
    "/search",
    inertiaPage("Search", (req) => ({
      query: dataProp(typeof req.query.q === "string" ? req.query.q : ""),
      results: lazyProp(async () => ["a", "b"]),
    }))
  );

  app.post("/items", (_req: Request, res: Response) => res.redirect("/items"));
  app.put("/items", (_req: Request, res: Response) => res.redirect("/items"));
  app.patch("/items", (_req: Request, res: Response) => res.redirect(302, "/items"));
  app.delete("/items", (_req: Request, res: Response) => res.redirect(301, "/items"));

  app.get("/away", (req: Request, res: Response) => location(req, res, "https://example.test/"));

  app.get("/bad-header", () => {
    throw new HeaderError("Header x-inertia-partial-data's value must contain only printable ASCII characters.");
  });

  app.get("/boom", () => {
    throw new Error("kaboom");
  });

  app.use(inertiaErrorHandler(logger));
  return app;
}

let running: RunningServer;
let baseUrl = "";

beforeAll(async () => {
  running = await startServer({
    app: createTestApp(),
    port: 0,
    host: "127.0.0.1",
    logger,
  });
  baseUrl = `http://127.0.0.1:${running.port}`;
});

afterAll(async () => {
  await running.shutdown();
});

function get(path: string, headers: Record<string, string> = {}) {
  return fetch(`${baseUrl}${path}`, { headers, redirect: "manual" });
}

const hydrated = { "X-Inertia": "true", "X-Inertia-Version": "v1" };

describe("full visits", () => {
  it("renders the root template", async () => {
    const response = await get("/");

    expect(response.status).toBe(200);
    expect(response.headers.get("content-type")).toBe("text/html; charset=utf-8");
    expect(response.headers.get("x-inertia")).toBeNull();
    expect(await response.text()).toBe(
      `<body><div id="app" data-page="${escaped({
        component: "Index",
        props: { appName: "demo", message: "hi" },
        url: "/",
        version: "v1",
      })}"></div></body>`
    );
  });

  it("redirects a stale plain navigation to the same URL", async () => {
    const response = await get("/?tab=2", { "X-Inertia-Version": "v0" });

    expect(response.status).toBe(302);
    expect(response.headers.get("location")).toBe("/?tab=2");
  });
});

describe("hydrated requests", () => {
  it("answers with the page as JSON", async () => {
    const response = await get("/search?q=ada", hydrated);

    expect(response.status).toBe(200);
    expect(response.headers.get("x-inertia")).toBe("true");
    expect(response.headers.get("vary")).toBe("X-Inertia");
    expect(response.headers.get("content-type")).toBe("application/json; charset=utf-8");
    expect(await response.json()).toEqual({
      component: "Search",
      props: { appName: "demo", query: "ada", results: ["a", "b"] },
      url: "/search?q=ada",
      version: "v1",
    });
  });

  it("sends only the requested props of a partial reload", async () => {
    const response = await get("/search?q=ada", {
      ...hydrated,
      "X-Inertia-Partial-Component": "Search",
      "X-Inertia-Partial-Data": "results",
    });

    expect(await response.json()).toMatchObject({
      props: { appName: "demo", results: ["a", "b"] },
    });
  });

  it("drops excluded props of a partial reload", async () => {
    const response = await get("/search?q=ada", {
      ...hydrated,
      "X-Inertia-Partial-Component": "Search",
      "X-Inertia-Partial-Except": "results",
    });

    const page: unknown = await response.json();
    expect(page).toEqual({
      component: "Search",
      props: { appName: "demo", query: "ada" },
      url: "/search?q=ada",
      version: "v1",
    });
  });

  it("forces a stale client to reload", async () => {
    const response = await get("/search?q=ada", {
      "X-Inertia": "true",
      "X-Inertia-Version": "v0",
    });

    expect(response.status).toBe(409);
    expect(response.headers.get("x-inertia-location")).toBe("/search?q=ada");
  });

  it("shares flashed errors", async () => {
    const response = await get("/", { ...hydrated, "X-Test-Flash": "1" });

    expect(await response.json()).toMatchObject({
      props: { appName: "demo", message: "hi", errors: { message: "Required" } },
    });
  });
});

describe("redirects", () => {
  it.each([
    ["POST", 302],
    ["PUT", 303],
    ["PATCH", 303],
    ["DELETE", 303],
  ])("answers %s with %i", async (method, status) => {
    const response = await fetch(`${baseUrl}/items`, { method, redirect: "manual" });

    expect(response.status).toBe(status);
    expect(response.headers.get("location")).toBe("/items");
  });

  it("sends hydrated clients to external URLs with a conflict", async () => {
    const response = await get("/away", hydrated);

    expect(response.status).toBe(409);
    expect(response.headers.get("x-inertia-location")).toBe("https://example.test/");
  });

  it("redirects browsers to external URLs", async () => {
    const response = await get("/away");

    expect(response.status).toBe(302);
    expect(response.headers.get("location")).toBe("https://example.test/");
  });
});

describe("errors", () => {
  it("answers engine errors with their status and code", async () => {
    const response = await get("/bad-header");

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      code: "INERTIA_HEADER",
      message: "Header x-inertia-partial-data's value must contain only printable ASCII characters.",
    });
  });

  it("hides unexpected errors behind a 500", async () => {
    const response = await get("/boom");

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({
      code: "INTERNAL_ERROR",
      message: "Internal server error",
    });
  });
});

describe("without the middleware", () => {
  it("fails with a configuration error", async () => {
    const app = express();
    app.get("/bare", (req: Request, res: Response, next: NextFunction) => {
      render(req, res, "Bare").catch(next);
    });
    app.use(inertiaErrorHandler(fakeLogger()));

    const bare = await startServer({ app, port: 0, host: "127.0.0.1", logger: fakeLogger() });

    try {
      const response = await fetch(`http://127.0.0.1:${bare.port}/bare`);

      expect(response.status).toBe(500);
      expect(await response.json()).toEqual({
        code: "INERTIA_CONFIG",
        message:
          "No Inertia context for GET /bare. Register inertiaMiddleware() before the routes.",
      });
    } finally {
      await bare.shutdown();
    }
  });
});
