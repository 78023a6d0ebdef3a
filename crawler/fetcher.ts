import { log } from "../server/logger";
import { extractEvent, extractEventReferences } from "./extractor";
import type { DetailResult, EventSource, ListOptions } from "./types";

export const DEFAULT_EVENTS_URL = "https://smoothcomp.com/en/events/upcoming";
const DEFAULT_TIMEOUT_MS = 30_000;
const USER_AGENT = "SmoothcompCalendar/1.0";

export interface FetchedPage {
  status: number;
  ok: boolean;
  body: string;
}

/**
 * GET a page and read its body under one deadline. A server that sends
 * headers and then stalls is aborted like one that never answers.
 */
export async function fetchWithTimeout(
  url: string,
  options: RequestInit & { timeoutMs: number },
): Promise<FetchedPage> {
  const { timeoutMs, ...init } = options;
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const response = await fetch(url, {
      ...init,
      signal: controller.signal,
      headers: {
        "User-Agent": USER_AGENT,
        ...(init.headers ?? {}),
      },
    });
    const body = await response.text();
    return { status: response.status, ok: response.ok, body };
  } finally {
    clearTimeout(timeout);
  }
}

export interface HttpEventSourceOptions {
  eventsUrl?: string;
  timeoutMs?: number;
}

export class HttpEventSource implements EventSource {
  readonly eventsUrl: string;
  private readonly timeoutMs: number;

  constructor(options: HttpEventSourceOptions = {}) {
    this.eventsUrl = options.eventsUrl ?? DEFAULT_EVENTS_URL;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /**
   * Rejects when the listing cannot be fetched or carries no event list;
   * a refresh cycle treats that as an abort.
   */
  async listEventReferences(options: ListOptions = {}): Promise<string[]> {
    const page = await fetchWithTimeout(this.eventsUrl, {
      timeoutMs: this.timeoutMs,
      method: "GET",
      headers: { Accept: "text/html" },
    });
    if (!page.ok) {
      throw new Error(`Listing fetch failed: HTTP ${page.status} ${this.eventsUrl}`);
    }

    const urls = extractEventReferences(page.body, this.eventsUrl);
    if (!urls) {
      throw new Error(`Listing page has no event list: ${this.eventsUrl}`);
    }
    return options.maxEvents ? urls.slice(0, options.maxEvents) : urls;
  }

  async fetchEventDetail(url: string): Promise<DetailResult> {
    let html: string;
    try {
      const page = await fetchWithTimeout(url, {
        timeoutMs: this.timeoutMs,
        method: "GET",
        headers: { Accept: "text/html" },
      });
      if (page.status !== 200) {
        return { kind: "skip", url, reason: `HTTP ${page.status}` };
      }
      html = page.body;
    } catch (error) {
      const reason = error instanceof Error ? error.message : "Unknown error";
      log(`Error fetching ${url}: ${reason}`, "fetch");
      return { kind: "skip", url, reason };
    }

    try {
      const { event, method } = extractEvent(html, url);
      return { kind: "event", event, method };
    } catch (error) {
      const reason = error instanceof Error ? error.message : "Unparsable page";
      log(`Error parsing ${url}: ${reason}`, "fetch");
      return { kind: "skip", url, reason };
    }
  }
}
