import type { JsonObject } from "@inertia-node/core";

export type EventRecord = JsonObject & {
  id: number;
  title: string;
  category: string;
};

export const CATEGORIES = ["foo", "bar"];

const EVENTS: readonly EventRecord[] = [
  { id: 80, title: "Release party", category: "foo" },
  { id: 81, title: "Protocol workshop", category: "bar" },
  { id: 82, title: "Hydration meetup", category: "foo" },
];

/**
 * In-memory event source standing in for a database.
 */
export async function listEvents(): Promise<EventRecord[]> {
  return EVENTS.map((event) => ({ ...event }));
}

export async function readRadioStatus(): Promise<JsonObject> {
  return { status: "on air", listeners: 42 };
}
