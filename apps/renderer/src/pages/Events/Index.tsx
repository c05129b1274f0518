import { readObject, readString, readStrings } from "../../props.js";
import type { PageModule, PageProps } from "../types.js";

function Events({ props }: PageProps) {
  const events = Array.isArray(props.events) ? props.events : [];
  const radio = readObject(props.radioStatus);

  return (
    <main>
      <h1>Events</h1>
      <nav>
        {readStrings(props.categories).map((category) => (
          <span key={category} className="category">
            {category}
          </span>
        ))}
      </nav>
      <ul>
        {events.map((event, index) => {
          const { title } = readObject(event);
          return <li key={index}>{readString(title)}</li>;
        })}
      </ul>
      {radio.status ? <p>Radio: {readString(radio.status)}</p> : null}
    </main>
  );
}

export const EventsPage: PageModule = {
  Component: Events,
  title: () => "Events",
};
