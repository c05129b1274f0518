/**
 * @fileoverview Prop factories and the visibility algorithm
 *
 * `resolveProps` decides, per request, which props of a table are sent and
 * evaluates only those. It reads the table and the request kind and nothing
 * else, so resolving the same table twice for the same kind sends the same
 * keys.
 *
 * EVALUATION POINT:
 * A lazy or on-demand thunk is invoked at most once per call, and only after
 * its key was selected. A dropped on-demand prop costs nothing.
 */

import type { JsonObject, JsonValue } from "./types/json.js";
import type {
  AlwaysProp,
  DataProp,
  LazyProp,
  OnDemandProp,
  PropertyTable,
  PropertyVariant,
  PropThunk,
  ResolvedProps,
} from "./types/props.js";
import type {
  PartialReloadSpec,
  RequestKind,
  TemporarySession,
} from "./types/request.js";

// ============================================================================
// FACTORY FUNCTIONS
// ============================================================================

/**
 * Sent on every visit, even when a partial reload filters it out.
 *
 * @example
 * const props = { auth: alwaysProp({ user: "Ada" }) };
 */
export function alwaysProp(value: JsonValue): AlwaysProp {
  return { kind: "always", value };
}

/**
 * Sent on standard visits and on partial reloads that select it.
 */
export function dataProp(value: JsonValue): DataProp {
  return { kind: "data", value };
}

/**
 * Evaluated on standard visits and on partial reloads that select it.
 *
 * @example
 * const props = { users: lazyProp(() => db.listUsers()) };
 */
export function lazyProp(resolve: PropThunk): LazyProp {
  return { kind: "lazy", resolve };
}

/**
 * Evaluated only on partial reloads that explicitly select it.
 */
export function onDemandProp(resolve: PropThunk): OnDemandProp {
  return { kind: "onDemand", resolve };
}

/**
 * Turns a plain JSON record into a table of data props.
 *
 * @example
 * toPropertyTable({ title: "Hello", tags: ["a", "b"] });
 * // { title: dataProp("Hello"), tags: dataProp(["a", "b"]) }
 */
export function toPropertyTable(values: JsonObject): PropertyTable {
  return Object.fromEntries(
    Object.entries(values).map(
      ([key, value]): [string, PropertyVariant] => [key, dataProp(value)]
    )
  );
}

// ============================================================================
// VISIBILITY
// ============================================================================

/**
 * Whether a filterable prop is part of a partial reload.
 */
export function isSelected(key: string, partial: PartialReloadSpec): boolean {
  if (partial.only.size > 0) {
    return partial.only.has(key);
  }
  return !partial.except.has(key);
}

function isIncluded(
  key: string,
  variant: PropertyVariant,
  kind: RequestKind
): boolean {
  if (kind.type === "standard") {
    return variant.kind !== "onDemand";
  }
  if (variant.kind === "always") {
    return true;
  }
  return isSelected(key, kind.partial);
}

function evaluate(variant: PropertyVariant): JsonValue | Promise<JsonValue> {
  switch (variant.kind) {
    case "always":
    case "data":
      return variant.value;
    case "lazy":
    case "onDemand":
      return variant.resolve();
  }
}

// ============================================================================
// RESOLUTION
// ============================================================================

/**
 * Resolves the props of a table for one request.
 *
 * Selected thunks are started together and awaited as a group. A rejected
 * thunk rejects the whole resolution.
 *
 * @example
 * await resolveProps(
 *   { radioStatus: onDemandProp(loadStatus), categories: dataProp(["foo"]) },
 *   { type: "standard" }
 * );
 * // { categories: ["foo"] }, loadStatus never called
 */
export async function resolveProps(
  table: PropertyTable,
  kind: RequestKind
): Promise<ResolvedProps> {
  const keys: string[] = [];
  const pending: Array<JsonValue | Promise<JsonValue>> = [];

  for (const [key, variant] of Object.entries(table)) {
    if (!isIncluded(key, variant, kind)) continue;
    keys.push(key);
    pending.push(evaluate(variant));
  }

  const values = await Promise.all(pending);

  // Own properties: a "__proto__" key stays a prop
  const entries: Array<[string, JsonValue]> = [];
  keys.forEach((key, index) => {
    const value = values[index];
    if (value !== undefined) entries.push([key, value]);
  });

  return Object.fromEntries(entries);
}

// ============================================================================
// MERGING
// ============================================================================

/**
 * Merges resolved shared props with resolved route props.
 *
 * Route props win on key collision: a page can always override what the
 * application shares by default.
 */
export function mergeProps(
  shared: ResolvedProps,
  route: ResolvedProps
): ResolvedProps {
  return { ...shared, ...route };
}

/**
 * Adds the flashed validation errors of a temporary session to the shared
 * props, as an always prop named `errors`.
 */
export function withSessionErrors(
  shared: PropertyTable,
  session: TemporarySession | null
): PropertyTable {
  if (!session?.errors) return shared;
  return { ...shared, errors: alwaysProp(session.errors) };
}
