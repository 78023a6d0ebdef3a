import { load, type CheerioAPI } from "cheerio";
import type { Event } from "@shared/schema";
import { emptyToNull, eventIdFromUrl } from "@shared/utils";
import type { JsonLdSportsEvent } from "./types";

const DEFAULT_SPORT = "Grappling";
const UNKNOWN_EVENT_NAME = "Unknown Event";
const TITLE_SUFFIX = /\s*\|\s*Smoothcomp.*$/i;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asRecord(value: unknown): Record<string, unknown> | null {
  return isRecord(value) ? value : null;
}

function hasType(obj: Record<string, unknown>, type: string) {
  const typeValue = obj["@type"];
  const types = Array.isArray(typeValue) ? typeValue : [typeValue];
  return types.some((t) => t === type);
}

/**
 * Top-level JSON-LD nodes of a page: plain objects, arrays and `@graph` members.
 */
function readJsonLdNodes($: CheerioAPI): Record<string, unknown>[] {
  const nodes: Record<string, unknown>[] = [];
  $('script[type="application/ld+json"]').each((_index, element) => {
    const raw = ($(element).html() ?? "").trim();
    if (!raw) return;
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      // Malformed blocks are skipped; another block may still carry the data.
      return;
    }
    const candidates = Array.isArray(parsed) ? parsed : [parsed];
    for (const candidate of candidates) {
      const obj = asRecord(candidate);
      if (!obj) continue;
      nodes.push(obj);
      const graph = obj["@graph"];
      if (Array.isArray(graph)) {
        for (const member of graph) {
          const memberObj = asRecord(member);
          if (memberObj) nodes.push(memberObj);
        }
      }
    }
  });
  return nodes;
}

function resolveUrlMaybe(value: string, pageUrl: string): string {
  try {
    return new URL(value, pageUrl).toString();
  } catch {
    return value;
  }
}

/**
 * Event page URLs listed in the ItemList JSON-LD of the listing page,
 * in page order. Returns null when the page carries no ItemList at all.
 */
export function extractEventReferences(html: string, pageUrl: string): string[] | null {
  const $ = load(html);
  const itemList = readJsonLdNodes($).find((node) => hasType(node, "ItemList"));
  if (!itemList) return null;

  const elements = itemList.itemListElement;
  if (!Array.isArray(elements)) return [];

  const urls: string[] = [];
  for (const element of elements) {
    const url = asRecord(element)?.url;
    if (typeof url === "string" && url.trim()) {
      urls.push(resolveUrlMaybe(url.trim(), pageUrl));
    }
  }
  return urls;
}

function parseDate(value: unknown): Date | null {
  if (typeof value !== "string" || !value.trim()) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

function readCountry(address: Record<string, unknown> | null): string | null {
  const country = address?.addressCountry;
  const countryObj = asRecord(country);
  if (countryObj) return emptyToNull(countryObj.name);
  return emptyToNull(country);
}

export function eventFromJsonLd(data: JsonLdSportsEvent, url: string): Event {
  const location = asRecord(data.location);
  const address = asRecord(location?.address);
  const organizer = asRecord(data.organizer);

  return {
    id: eventIdFromUrl(url),
    name: emptyToNull(data.name) ?? UNKNOWN_EVENT_NAME,
    url,
    startDate: parseDate(data.startDate),
    endDate: parseDate(data.endDate),
    location: emptyToNull(location?.name),
    city: emptyToNull(address?.addressLocality),
    country: readCountry(address),
    sport: emptyToNull(data.sport) ?? DEFAULT_SPORT,
    organizer: emptyToNull(organizer?.name),
    participants: null,
    registrationOpen: true,
  };
}

/**
 * Minimal record when a page has no SportsEvent metadata: identity and title only.
 */
export function eventFromTitle($: CheerioAPI, url: string): Event {
  const title = $("title").first().text().trim().replace(TITLE_SUFFIX, "");
  return {
    id: eventIdFromUrl(url),
    name: title || UNKNOWN_EVENT_NAME,
    url,
    startDate: null,
    endDate: null,
    location: null,
    city: null,
    country: null,
    sport: null,
    organizer: null,
    participants: null,
    registrationOpen: false,
  };
}

export function extractEvent(
  html: string,
  url: string,
): { event: Event; method: "jsonld" | "title" } {
  const $ = load(html);
  const sportsEvent = readJsonLdNodes($).find((node) => hasType(node, "SportsEvent"));
  if (sportsEvent) {
    return { event: eventFromJsonLd(sportsEvent, url), method: "jsonld" };
  }
  return { event: eventFromTitle($, url), method: "title" };
}
