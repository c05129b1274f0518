/**
 * @fileoverview Property variants for Inertia pages
 *
 * A page's props are declared as a table of named variants. The variant
 * decides when a prop is sent and when (if ever) its value is computed:
 *
 * | kind       | standard visit     | partial reload                   |
 * |------------|--------------------|----------------------------------|
 * | always     | sent               | sent, filters ignored            |
 * | data       | sent               | sent when selected               |
 * | lazy       | evaluated and sent | evaluated and sent when selected |
 * | onDemand   | never              | evaluated and sent when selected |
 *
 * The union is discriminated on `kind`, so a `switch` over it is checked for
 * exhaustiveness by the compiler.
 */

import type { JsonObject, JsonValue } from "./json.js";

// ============================================================================
// THUNKS
// ============================================================================

/**
 * Zero-argument resolver of a lazy or on-demand prop.
 *
 * Thunks may touch external resources (a database read, an HTTP call) and may
 * run concurrently for independent requests. They must not depend on which
 * other keys were selected.
 */
export type PropThunk = () => JsonValue | Promise<JsonValue>;

// ============================================================================
// VARIANTS
// ============================================================================

export type AlwaysProp = {
  kind: "always";
  value: JsonValue;
};

export type DataProp = {
  kind: "data";
  value: JsonValue;
};

export type LazyProp = {
  kind: "lazy";
  resolve: PropThunk;
};

export type OnDemandProp = {
  kind: "onDemand";
  resolve: PropThunk;
};

export type PropertyVariant = AlwaysProp | DataProp | LazyProp | OnDemandProp;

/**
 * Mapping of prop name to variant, owned by the route handler.
 */
export type PropertyTable = Readonly<Record<string, PropertyVariant>>;

/**
 * Concrete prop values sent to the client for one request.
 */
export type ResolvedProps = JsonObject;
