import type { Request } from "express";
import type {
  Inertia,
  PropertyTable,
  TemporarySession,
} from "@inertia-node/core";

export type InertiaContext = {
  inertia: Inertia;
  sharedProps: PropertyTable;
  session: TemporarySession | null;
};

const contexts = new WeakMap<Request, InertiaContext>();

export function setInertiaContext(req: Request, context: InertiaContext): void {
  contexts.set(req, context);
}

export function getInertiaContext(req: Request): InertiaContext | null {
  return contexts.get(req) ?? null;
}
