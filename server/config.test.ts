import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { loadConfig } from "./config";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({});
    expect(config).toMatchObject({
      port: 5000,
      databaseUrl: undefined,
      cacheTtlMs: 60 * 60 * 1000,
      rateLimitMs: 300,
      fetchTimeoutMs: 30_000,
      eventsUrl: "https://smoothcomp.com/en/events/upcoming",
      calendarTtlMinutes: 360,
      outputDir: "static",
    });
  });

  it("reads overrides and treats a blank database url as unset", () => {
    const config = loadConfig({ CACHE_TTL_HOURS: "2", SCRAPE_RATE_LIMIT_MS: "0", DATABASE_URL: "" });
    expect(config.cacheTtlMs).toBe(2 * 60 * 60 * 1000);
    expect(config.rateLimitMs).toBe(0);
    expect(config.databaseUrl).toBeUndefined();
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ PORT: "not-a-port" })).toThrow(ZodError);
  });
});
