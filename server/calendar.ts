import type { Event } from "@shared/schema";

export const DEFAULT_CALENDAR_NAME = "Smoothcomp Events";
export const DEFAULT_CALENDAR_TTL_MINUTES = 360;
export const DEFAULT_EVENT_DURATION_HOURS = 8;
const PRODID = "-//Smoothcomp Calendar//smoothcomp.com//";
const UID_DOMAIN = "smoothcomp.com";
const MAX_LINE_OCTETS = 75;

export function formatIcsDate(date: Date): string {
  return date.toISOString().replace(/[-:]/g, "").slice(0, 15) + "Z";
}

export function escapeIcsText(value: string): string {
  return value
    .replace(/\\/g, "\\\\")
    .replace(/;/g, "\\;")
    .replace(/,/g, "\\,")
    .replace(/\r\n|\r|\n/g, "\\n");
}

/**
 * Fold a content line to at most 75 octets per physical line, continuation
 * lines starting with a single space. Never splits a UTF-8 sequence.
 */
export function foldIcsLine(line: string): string {
  if (Buffer.byteLength(line, "utf8") <= MAX_LINE_OCTETS) return line;

  const parts: string[] = [];
  let current = "";
  let currentOctets = 0;
  let limit = MAX_LINE_OCTETS;
  for (const char of line) {
    const octets = Buffer.byteLength(char, "utf8");
    if (currentOctets + octets > limit) {
      parts.push(current);
      current = "";
      currentOctets = 0;
      // Continuation lines spend one octet on the leading space.
      limit = MAX_LINE_OCTETS - 1;
    }
    current += char;
    currentOctets += octets;
  }
  parts.push(current);
  return parts.join("\r\n ");
}

export function eventEndDate(event: Pick<Event, "startDate" | "endDate">): Date | null {
  if (event.endDate) return event.endDate;
  if (!event.startDate) return null;
  return new Date(event.startDate.getTime() + DEFAULT_EVENT_DURATION_HOURS * 60 * 60 * 1000);
}

function locationText(event: Event): string | null {
  const parts = [event.location, event.city, event.country].filter(
    (part): part is string => Boolean(part),
  );
  return parts.length > 0 ? parts.join(", ") : null;
}

function descriptionText(event: Event): string {
  const lines: string[] = [];
  if (event.sport) lines.push(`Sport: ${event.sport}`);
  if (event.organizer) lines.push(`Organizer: ${event.organizer}`);
  if (event.participants) lines.push(`Participants: ${event.participants}`);
  lines.push(`Details: ${event.url}`);
  return lines.join("\n");
}

/**
 * VEVENT lines for one event, or null when it has no start time.
 */
export function eventLines(event: Event, stamp: Date): string[] | null {
  if (!event.startDate) return null;
  const end = eventEndDate(event) ?? event.startDate;

  const lines = [
    "BEGIN:VEVENT",
    `UID:${event.id}@${UID_DOMAIN}`,
    `DTSTAMP:${formatIcsDate(stamp)}`,
    `DTSTART:${formatIcsDate(event.startDate)}`,
    `DTEND:${formatIcsDate(end)}`,
    `SUMMARY:${escapeIcsText(event.name)}`,
  ];
  const location = locationText(event);
  if (location) lines.push(`LOCATION:${escapeIcsText(location)}`);
  lines.push(`DESCRIPTION:${escapeIcsText(descriptionText(event))}`);
  lines.push(`URL:${event.url}`);
  if (event.sport) lines.push(`CATEGORIES:${escapeIcsText(event.sport)}`);
  lines.push("END:VEVENT");
  return lines;
}

export interface RenderOptions {
  calendarName?: string;
  ttlMinutes?: number;
  now?: Date;
}

/**
 * Render events as an iCalendar document. Events without a start time are left out.
 */
export function generateIcal(events: Event[], options: RenderOptions = {}): string {
  const calendarName = options.calendarName ?? DEFAULT_CALENDAR_NAME;
  const ttlMinutes = options.ttlMinutes ?? DEFAULT_CALENDAR_TTL_MINUTES;
  const stamp = options.now ?? new Date();

  const lines = [
    "BEGIN:VCALENDAR",
    `PRODID:${PRODID}`,
    "VERSION:2.0",
    "CALSCALE:GREGORIAN",
    "METHOD:PUBLISH",
    `X-WR-CALNAME:${escapeIcsText(calendarName)}`,
    "X-WR-TIMEZONE:UTC",
    `REFRESH-INTERVAL;VALUE=DURATION:PT${ttlMinutes}M`,
    `X-PUBLISHED-TTL:PT${ttlMinutes}M`,
  ];
  for (const event of events) {
    const vevent = eventLines(event, stamp);
    if (vevent) lines.push(...vevent);
  }
  lines.push("END:VCALENDAR");

  return lines.map(foldIcsLine).join("\r\n") + "\r\n";
}

export function calendarNameFor(filters: { country?: string; sport?: string }): string {
  const parts = ["Smoothcomp"];
  if (filters.country) parts.push(filters.country);
  if (filters.sport) parts.push(filters.sport);
  parts.push("Events");
  return parts.join(" ");
}

/**
 * webcal:// subscription URL for a calendar endpoint, with its filters.
 */
export function generateWebcalUrl(
  baseUrl: string,
  filters: { country?: string; sport?: string; days?: number } = {},
): string {
  const webcalUrl = baseUrl.replace(/^https?:\/\//, "webcal://");
  const params = new URLSearchParams();
  if (filters.country) params.set("country", filters.country);
  if (filters.sport) params.set("sport", filters.sport);
  if (filters.days) params.set("days", String(filters.days));
  const query = params.toString();
  return query ? `${webcalUrl}?${query}` : webcalUrl;
}
