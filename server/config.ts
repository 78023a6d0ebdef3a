import "dotenv/config";
import { z } from "zod";
import { DEFAULT_EVENTS_URL } from "../crawler/fetcher";

const optionalUrl = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined))
  .pipe(z.string().url().optional());

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(5000),
  DATABASE_URL: optionalUrl,
  CACHE_TTL_HOURS: z.coerce.number().positive().default(1),
  SCRAPE_RATE_LIMIT_MS: z.coerce.number().int().min(0).default(300),
  FETCH_TIMEOUT_MS: z.coerce.number().int().min(1000).default(30_000),
  EVENTS_URL: z.string().url().default(DEFAULT_EVENTS_URL),
  CALENDAR_TTL_MINUTES: z.coerce.number().int().min(1).default(360),
  REFRESH_CHECK_INTERVAL_MS: z.coerce.number().int().min(1000).default(5 * 60 * 1000),
  OUTPUT_DIR: z.string().trim().min(1).default("static"),
});

export type AppConfig = {
  port: number;
  databaseUrl: string | undefined;
  cacheTtlMs: number;
  rateLimitMs: number;
  fetchTimeoutMs: number;
  eventsUrl: string;
  calendarTtlMinutes: number;
  refreshCheckIntervalMs: number;
  outputDir: string;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  return Object.freeze({
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL,
    cacheTtlMs: parsed.CACHE_TTL_HOURS * 60 * 60 * 1000,
    rateLimitMs: parsed.SCRAPE_RATE_LIMIT_MS,
    fetchTimeoutMs: parsed.FETCH_TIMEOUT_MS,
    eventsUrl: parsed.EVENTS_URL,
    calendarTtlMinutes: parsed.CALENDAR_TTL_MINUTES,
    refreshCheckIntervalMs: parsed.REFRESH_CHECK_INTERVAL_MS,
    outputDir: parsed.OUTPUT_DIR,
  });
}
