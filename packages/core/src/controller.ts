/**
 * @fileoverview The protocol controller
 *
 * One request goes through these states:
 *
 *   Received -> Classified -> VersionChecked -> ForcedRefresh
 *                                            -> Proceed -> JsonResponse
 *                                                       -> FullRender
 *
 * - Classified: the partial-reload headers become a RequestKind. A malformed
 *   header fails the request with a HeaderError.
 * - VersionChecked: a stale client is sent away before any prop is resolved.
 * - Proceed: shared and route props are resolved with the same RequestKind,
 *   merged, and wrapped into a Page.
 * - JsonResponse: hydrated clients get the page as JSON.
 * - FullRender: browsers get the root template, pre-rendered when SSR is on.
 *
 * The controller knows nothing about the HTTP framework. It talks to the
 * request through an `InertiaBinding`, which the framework package provides.
 */

import type { InertiaConfig } from "./config.js";
import { InertiaError, RenderError, describeError } from "./errors.js";
import { INERTIA_HEADERS, rawHeader } from "./headers.js";
import { buildPage, serializePage } from "./page.js";
import { mergeProps, resolveProps, withSessionErrors } from "./props.js";
import { classifyRequest, isInertiaRequest } from "./requestKind.js";
import { requestSsrRender } from "./ssr/ssrClient.js";
import type { Page, SsrResult } from "./types/page.js";
import type { PropertyTable } from "./types/props.js";
import type { RequestHeaders, TemporarySession } from "./types/request.js";
import { negotiateVersion, type VersionDecision } from "./version.js";

// ============================================================================
// BINDING
// ============================================================================

/**
 * How a location response is sent: `conflict` is a 409 carrying
 * x-inertia-location, `redirect` an ordinary 302.
 */
export type LocationMode = "conflict" | "redirect";

/**
 * What the controller needs from a request and its response.
 */
export type InertiaBinding<TResponse> = {
  readonly headers: RequestHeaders;
  /** Path and query of the request, e.g. "/events?page=2" */
  readonly url: string;
  /** Props shared by every page of this request */
  sharedProps(): PropertyTable;
  temporarySession(): TemporarySession | null;
  /** Sends the page as JSON with the PAGE_RESPONSE_HEADERS */
  pageResponse(page: Page, body: string): TResponse;
  htmlResponse(html: string): TResponse;
  locationResponse(url: string, mode: LocationMode): TResponse;
};

/**
 * Headers of a JSON page response.
 */
export const PAGE_RESPONSE_HEADERS = {
  [INERTIA_HEADERS.INERTIA]: "true",
  Vary: "X-Inertia",
} as const;

// ============================================================================
// CONTROLLER
// ============================================================================

/**
 * @example
 * const inertia = new Inertia(createInertiaConfig({ ... }));
 *
 * app.get("/events", async (req, res, next) => {
 *   try {
 *     await inertia.render(expressBinding(req, res), "Events/Index", {
 *       events: lazyProp(() => db.listEvents()),
 *     });
 *   } catch (error) {
 *     next(error);
 *   }
 * });
 */
export class Inertia {
  readonly config: InertiaConfig;

  constructor(config: InertiaConfig) {
    this.config = config;
  }

  /** Current asset version */
  get version(): string {
    return this.config.version.get();
  }

  /**
   * Answers a request with a page.
   *
   * @throws HeaderError for malformed partial-reload headers
   * @throws SerializationError when the props cannot be sent as JSON
   * @throws RenderError when the root template fails
   */
  async render<TResponse>(
    binding: InertiaBinding<TResponse>,
    component: string,
    props: PropertyTable = {}
  ): Promise<TResponse> {
    const kind = classifyRequest(binding.headers);
    const isInertia = isInertiaRequest(binding.headers);
    const currentVersion = this.config.version.get();

    const decision = negotiateVersion({
      clientVersion: rawHeader(binding.headers, INERTIA_HEADERS.VERSION),
      currentVersion,
      isInertia,
    });

    if (decision.type !== "fresh") {
      return this.refresh(binding, decision);
    }

    const shared = withSessionErrors(
      binding.sharedProps(),
      binding.temporarySession()
    );

    const [sharedProps, routeProps] = await Promise.all([
      resolveProps(shared, kind),
      resolveProps(props, kind),
    ]);

    const page = buildPage(
      component,
      binding.url,
      currentVersion,
      mergeProps(sharedProps, routeProps)
    );

    if (isInertia) {
      return binding.pageResponse(page, serializePage(page));
    }

    const ssr = await this.renderOnServer(page);
    const html = await this.renderTemplate(page, ssr);
    return binding.htmlResponse(html);
  }

  /**
   * Redirects to a URL, possibly outside the application. Hydrated clients
   * get a 409 so they perform a full browser visit.
   */
  location<TResponse>(binding: InertiaBinding<TResponse>, url: string): TResponse {
    const mode: LocationMode = isInertiaRequest(binding.headers)
      ? "conflict"
      : "redirect";
    return binding.locationResponse(url, mode);
  }

  private async refresh<TResponse>(
    binding: InertiaBinding<TResponse>,
    decision: Exclude<VersionDecision, { type: "fresh" }>
  ): Promise<TResponse> {
    if (decision.type === "redirect") {
      return binding.locationResponse(binding.url, "redirect");
    }

    await this.reflash(binding);
    return binding.locationResponse(binding.url, "conflict");
  }

  private async reflash<TResponse>(binding: InertiaBinding<TResponse>): Promise<void> {
    const hook = this.config.reflashSession;
    const session = binding.temporarySession();
    if (!hook || !session) return;

    try {
      await hook(session, { headers: binding.headers, url: binding.url });
    } catch (error) {
      this.config.logger.warn(
        `Failed to reflash Inertia temporary session. ${describeError(error)}`
      );
    }
  }

  private async renderOnServer(page: Page): Promise<SsrResult | null> {
    const { ssr, logger, fetch } = this.config;
    if (!ssr) return null;

    return requestSsrRender(ssr.url, page, {
      logger,
      timeoutMs: ssr.timeoutMs,
      ...(fetch ? { fetch } : {}),
    });
  }

  private async renderTemplate(page: Page, ssr: SsrResult | null): Promise<string> {
    const { templatePath, templateResolver, url } = this.config;
    const viewProps = { appUrl: url, ...this.config.viewProps };

    try {
      return await templateResolver(templatePath, { page, ssr, viewProps });
    } catch (error) {
      if (error instanceof InertiaError) throw error;
      throw new RenderError(
        `Failed to render root template ${templatePath}: ${describeError(error)}`,
        { cause: error }
      );
    }
  }
}
