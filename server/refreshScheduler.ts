import { log } from "./logger";
import type { RefreshOrchestrator } from "./refreshOrchestrator";

const DEFAULT_INTERVAL_MS = 5 * 60 * 1000;

export function startRefreshScheduler(
  refresher: Pick<RefreshOrchestrator, "maybeRefresh">,
  intervalMs = DEFAULT_INTERVAL_MS,
) {
  let checking = false;
  const interval = setInterval(async () => {
    if (checking) {
      log("Staleness check already running, skipping interval tick.", "scheduler");
      return;
    }
    checking = true;
    try {
      if (await refresher.maybeRefresh()) {
        log("Cache is stale; refresh started.", "scheduler");
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      log(`Refresh scheduler error: ${message}`, "scheduler");
    } finally {
      checking = false;
    }
  }, intervalMs);

  log(`Refresh scheduler started (interval ${intervalMs}ms).`, "scheduler");

  return () => {
    clearInterval(interval);
    log("Refresh scheduler stopped.", "scheduler");
  };
}
