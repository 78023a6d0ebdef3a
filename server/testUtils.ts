import type { Event } from "@shared/schema";
import { eventIdFromUrl } from "@shared/utils";
import type { DetailResult, EventSource, ListOptions } from "../crawler/types";

export function eventUrl(id: string) {
  return `https://smoothcomp.com/en/event/${id}`;
}

export function makeEvent(id: string, overrides: Partial<Event> = {}): Event {
  const url = overrides.url ?? eventUrl(id);
  return {
    id: eventIdFromUrl(url),
    name: `Event ${id}`,
    url,
    startDate: new Date("2030-06-01T10:00:00Z"),
    endDate: null,
    location: null,
    city: null,
    country: null,
    sport: null,
    organizer: null,
    participants: null,
    registrationOpen: true,
    ...overrides,
  };
}

/**
 * In-process stand-in for the source site. Pages are keyed by URL; a URL
 * with no page answers with a skip.
 */
export class FakeEventSource implements EventSource {
  readonly fetched: string[] = [];
  listing: string[] | Error;
  pages = new Map<string, Event | Error>();

  constructor(listing: string[] | Error = []) {
    this.listing = listing;
  }

  addEvent(event: Event) {
    this.pages.set(event.url, event);
    return this;
  }

  async listEventReferences(options: ListOptions = {}): Promise<string[]> {
    if (this.listing instanceof Error) throw this.listing;
    return options.maxEvents ? this.listing.slice(0, options.maxEvents) : [...this.listing];
  }

  async fetchEventDetail(url: string): Promise<DetailResult> {
    this.fetched.push(url);
    const page = this.pages.get(url);
    if (page instanceof Error) throw page;
    if (!page) return { kind: "skip", url, reason: "HTTP 404" };
    return { kind: "event", event: page, method: "jsonld" };
  }
}
