import type { ReactElement } from "react";
import type { JsonObject } from "@inertia-node/core";

export type PageProps = { props: JsonObject };

/**
 * A page the renderer knows how to draw.
 */
export type PageModule = {
  Component: (pageProps: PageProps) => ReactElement;
  /** Document title for the head */
  title: (props: JsonObject) => string;
};
