import { readObject, readString } from "../props.js";
import type { PageModule, PageProps } from "./types.js";

function Contact({ props }: PageProps) {
  const user = readObject(props.user);
  const errors = readObject(props.errors);
  const messageError = readString(errors.message);

  return (
    <main>
      <h1>Hey! I&apos;m {readString(user.name)}</h1>
      <p>
        Contact me: <em>{readString(user.email)}</em>
      </p>

      <form method="post" action="/contact">
        <textarea name="message" />
        {messageError ? <p className="error">{messageError}</p> : null}
        <button type="submit">Send</button>
      </form>

      <a href="/">Back to home</a>
    </main>
  );
}

export const ContactPage: PageModule = {
  Component: Contact,
  title: (props) => `My name is ${readString(readObject(props.user).name)}!`,
};
