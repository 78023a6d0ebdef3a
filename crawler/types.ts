import type { Event } from "@shared/schema";

export type DetailResult =
  | { kind: "event"; event: Event; method: "jsonld" | "title" }
  | { kind: "skip"; url: string; reason: string };

export interface ListOptions {
  maxEvents?: number;
}

/**
 * Network-facing side of a refresh: the listing page and one page per event.
 * `fetchEventDetail` never rejects; every per-page problem becomes a skip.
 */
export interface EventSource {
  listEventReferences(options?: ListOptions): Promise<string[]>;
  fetchEventDetail(url: string): Promise<DetailResult>;
}

export interface JsonLdSportsEvent {
  "@type"?: unknown;
  name?: unknown;
  startDate?: unknown;
  endDate?: unknown;
  sport?: unknown;
  location?: unknown;
  organizer?: unknown;
  [key: string]: unknown;
}
