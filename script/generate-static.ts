import { parseArgs } from "util";
import { HttpEventSource } from "../crawler/fetcher";
import { loadConfig } from "../server/config";
import { log } from "../server/logger";
import { generateStaticSite } from "../server/staticSite";

function parseLimit(value: string | undefined) {
  if (value === undefined) return undefined;
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit < 1) {
    throw new Error(`--limit must be a positive integer, got "${value}"`);
  }
  return limit;
}

async function main() {
  const { values } = parseArgs({
    options: {
      limit: { type: "string" },
      help: { type: "boolean", short: "h" },
    },
  });
  if (values.help) {
    console.log("Usage: generate-static [--limit N]\n\nScrape upcoming events and write static calendars to OUTPUT_DIR.");
    return;
  }

  const config = loadConfig();
  const metadata = await generateStaticSite({
    source: new HttpEventSource({ eventsUrl: config.eventsUrl, timeoutMs: config.fetchTimeoutMs }),
    outputDir: config.outputDir,
    limit: parseLimit(values.limit),
    rateLimitMs: config.rateLimitMs,
    calendarTtlMinutes: config.calendarTtlMinutes,
  });

  log(`Done! Files written to ${config.outputDir}/`, "static");
  log(`  - metadata.json (${metadata.countries.length} countries)`, "static");
  log("  - calendars/*.ics", "static");
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
