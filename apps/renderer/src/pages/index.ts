import { ContactPage } from "./Contact.js";
import { EventsPage } from "./Events/Index.js";
import { FooPage } from "./Foo/Index.js";
import { IndexPage } from "./Index.js";
import type { PageModule } from "./types.js";

export type { PageModule, PageProps } from "./types.js";

/**
 * Pages by component name, as the server names them in `render()`.
 */
export const pages: Readonly<Record<string, PageModule>> = {
  Index: IndexPage,
  Contact: ContactPage,
  "Events/Index": EventsPage,
  "Foo/Index": FooPage,
};
