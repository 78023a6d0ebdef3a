import { createServer } from "http";
import { HttpEventSource } from "../crawler/fetcher";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { createDatabase } from "./db";
import { EventService } from "./eventService";
import { log } from "./logger";
import { PgEventStore } from "./pgEventStore";
import { RefreshOrchestrator } from "./refreshOrchestrator";
import { startRefreshScheduler } from "./refreshScheduler";
import { ensureEventSchema } from "./schemaEnsure";
import { MemEventStore, type IEventStore } from "./storage";

async function main() {
  const config = loadConfig();
  const database = createDatabase(config.databaseUrl);

  let store: IEventStore;
  if (database) {
    const client = await database.pool.connect();
    try {
      await ensureEventSchema({ query: (text, values) => client.query(text, values) });
    } finally {
      client.release();
    }
    store = new PgEventStore(database.db);
  } else {
    store = new MemEventStore();
  }

  const refresher = new RefreshOrchestrator({
    store,
    source: new HttpEventSource({
      eventsUrl: config.eventsUrl,
      timeoutMs: config.fetchTimeoutMs,
    }),
    ttlMs: config.cacheTtlMs,
    rateLimitMs: config.rateLimitMs,
  });

  const app = createApp({
    events: new EventService(store, refresher),
    refresher,
    calendarTtlMinutes: config.calendarTtlMinutes,
  });
  const httpServer = createServer(app);

  if ((await refresher.isStale()) || (await store.totalCount()) === 0) {
    refresher.tryStartRefresh();
  }
  const stopScheduler = startRefreshScheduler(refresher, config.refreshCheckIntervalMs);

  httpServer.on("close", () => {
    stopScheduler();
    if (database) {
      database.pool.end().catch((error: unknown) => {
        log(`Error closing database pool: ${error instanceof Error ? error.message : String(error)}`, "db");
      });
    }
  });

  httpServer.listen({ port: config.port, host: "0.0.0.0" }, () => {
    log(`serving on port ${config.port}`);
  });
}

main().catch((error) => {
  console.error(error instanceof Error ? (error.stack ?? error.message) : String(error));
  process.exit(1);
});
