import { readObject, readString } from "../props.js";
import type { PageModule, PageProps } from "./types.js";

function Index({ props }: PageProps) {
  const user = readString(readObject(props.auth).user, "guest");

  return (
    <main>
      <h1>Hello, {user}!</h1>
      <p>{readString(props.message)}</p>
      <p>
        <a href="/contact">Contact</a> · <a href="/events">Events</a>
      </p>
      <small>v{readString(props.version)}</small>
    </main>
  );
}

export const IndexPage: PageModule = {
  Component: Index,
  title: () => "Home",
};
