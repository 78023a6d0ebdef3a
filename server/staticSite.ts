import { promises as fs } from "fs";
import path from "path";
import type { Event } from "@shared/schema";
import { slugify } from "@shared/utils";
import type { EventSource } from "../crawler/types";
import { generateIcal } from "./calendar";
import { log } from "./logger";
import { RefreshQueue } from "./refreshQueue";
import { isPastEvent, type Clock } from "./storage";
import { sleep as defaultSleep } from "./refreshOrchestrator";

const UNKNOWN_COUNTRY = "Unknown";

export interface StaticCountry {
  name: string;
  slug: string;
  count: number;
}

export interface StaticMetadata {
  generatedAt: string;
  totalEvents: number;
  countries: StaticCountry[];
}

export interface GenerateStaticOptions {
  source: EventSource;
  outputDir: string;
  limit?: number;
  rateLimitMs?: number;
  calendarTtlMinutes?: number;
  now?: Clock;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Scrape every listed upcoming event, skipping unreachable pages and past events.
 */
export async function collectUpcomingEvents(options: GenerateStaticOptions): Promise<Event[]> {
  const now = options.now ?? (() => new Date());
  const wait = options.sleep ?? defaultSleep;
  const urls = await options.source.listEventReferences({ maxEvents: options.limit });
  const queue = RefreshQueue.partition(urls, new Set());

  const collected: Event[] = [];
  for (const entry of queue.entries()) {
    const result = await options.source.fetchEventDetail(entry.url);
    if (result.kind === "event" && !isPastEvent(result.event, now())) {
      collected.push(result.event);
    }
    if (entry.position % 50 === 0 || entry.position === queue.size) {
      const skipped = entry.position - collected.length;
      log(
        `Progress: ${entry.position}/${queue.size} scraped, ${collected.length} kept (${skipped} skipped)`,
        "static",
      );
    }
    await wait(options.rateLimitMs ?? 300);
  }
  return collected;
}

export function groupByCountry(events: Event[]): Map<string, Event[]> {
  const byCountry = new Map<string, Event[]>();
  for (const event of events) {
    const country = event.country ?? UNKNOWN_COUNTRY;
    const bucket = byCountry.get(country) ?? [];
    bucket.push(event);
    byCountry.set(country, bucket);
  }
  return byCountry;
}

/**
 * Write metadata.json and one calendars/<slug>.ics per country.
 */
export async function writeStaticSite(
  events: Event[],
  options: Pick<GenerateStaticOptions, "outputDir" | "calendarTtlMinutes" | "now">,
): Promise<StaticMetadata> {
  const now = options.now ?? (() => new Date());
  const calendarsDir = path.join(options.outputDir, "calendars");
  await fs.mkdir(calendarsDir, { recursive: true });

  const byCountry = groupByCountry(events);
  const countries = Array.from(byCountry.keys())
    .filter((country) => country !== UNKNOWN_COUNTRY)
    .sort((a, b) => (byCountry.get(b)?.length ?? 0) - (byCountry.get(a)?.length ?? 0));

  const metadata: StaticMetadata = {
    generatedAt: now().toISOString(),
    totalEvents: events.length,
    countries: countries.map((country) => ({
      name: country,
      slug: slugify(country),
      count: byCountry.get(country)?.length ?? 0,
    })),
  };
  await fs.writeFile(
    path.join(options.outputDir, "metadata.json"),
    JSON.stringify(metadata, null, 2),
  );

  for (const country of metadata.countries) {
    const calendar = generateIcal(byCountry.get(country.name) ?? [], {
      calendarName: `Smoothcomp ${country.name} Events`,
      ttlMinutes: options.calendarTtlMinutes,
      now: now(),
    });
    await fs.writeFile(path.join(calendarsDir, `${country.slug}.ics`), calendar);
    log(`${country.name}: ${country.count} events`, "static");
  }
  return metadata;
}

export async function generateStaticSite(options: GenerateStaticOptions) {
  log(`Output directory: ${options.outputDir}`, "static");
  if (options.limit) {
    log(`Test mode: limiting to ${options.limit} events`, "static");
  }
  const events = await collectUpcomingEvents(options);
  log(`Collected ${events.length} upcoming events`, "static");
  return writeStaticSite(events, options);
}
