import type { PageModule } from "../types.js";

function Foo() {
  return (
    <main>
      <h1>Foo</h1>
      <p>A page without props, served by a route helper.</p>
      <a href="/">Back to home</a>
    </main>
  );
}

export const FooPage: PageModule = {
  Component: Foo,
  title: () => "Foo",
};
