/**
 * Shared utility functions for the event calendar
 */

const EVENT_ID_PATTERN = /\/event\/(\d+)/;

/**
 * Source-assigned event ID embedded in an event page URL, or null when absent
 */
export function parseEventId(url: string): string | null {
  const match = url.match(EVENT_ID_PATTERN);
  return match?.[1] ?? null;
}

/**
 * Stable primary key for an event page: the parsed ID, or the URL itself
 */
export function eventIdFromUrl(url: string): string {
  return parseEventId(url) ?? url;
}

/**
 * Normalize free text for case-insensitive comparison
 */
export function normalizeFilterText(value: string): string {
  return value.trim().toLowerCase();
}

/**
 * Case-insensitive substring match used by the country and sport filters
 */
export function matchesFilter(value: string | null | undefined, filter?: string): boolean {
  if (!filter) return true;
  if (!value) return false;
  return value.toLowerCase().includes(normalizeFilterText(filter));
}

/**
 * Escape LIKE wildcards so a filter is matched literally
 */
export function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}

export function slugify(text: string): string {
  return text
    .toLowerCase()
    .trim()
    .replace(/[^\w\s-]/g, "")
    .replace(/[-\s]+/g, "-");
}

export function emptyToNull(value: unknown): string | null {
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
}
