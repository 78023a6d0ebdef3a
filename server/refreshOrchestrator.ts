import type { EventSource, ListOptions } from "../crawler/types";
import { log } from "./logger";
import { RefreshQueue } from "./refreshQueue";
import type { Clock, IEventStore, RetirementResult } from "./storage";

const DEFAULT_TTL_MS = 60 * 60 * 1000;
const DEFAULT_RATE_LIMIT_MS = 300;
const PROGRESS_EVERY = 50;

export const sleep = (ms: number) =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });

export type RefreshStage = "listing" | "scrape" | "retire";

export interface RefreshCounts {
  newCount: number;
  updatedCount: number;
  skippedCount: number;
  pastCount: number;
}

export type RefreshOutcome =
  | ({
      status: "completed";
      refreshTime: Date;
      finishedAt: Date;
      total: number;
      retired: RetirementResult;
    } & RefreshCounts)
  | ({
      status: "failed";
      refreshTime: Date;
      finishedAt: Date;
      stage: RefreshStage;
      error: string;
    } & RefreshCounts);

export type RefreshState =
  | { status: "idle"; lastOutcome: RefreshOutcome | null }
  | {
      status: "running";
      refreshTime: Date;
      processed: number;
      total: number | null;
      lastOutcome: RefreshOutcome | null;
    };

export interface RefreshOrchestratorOptions {
  store: IEventStore;
  source: EventSource;
  ttlMs?: number;
  rateLimitMs?: number;
  listOptions?: ListOptions;
  now?: Clock;
  sleep?: (ms: number) => Promise<void>;
}

function errorMessage(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Single-flight incremental refresh of the event store.
 *
 * Only a fully successful cycle retires events and advances the
 * last-update marker; a failed one leaves whatever it already upserted.
 */
export class RefreshOrchestrator {
  private readonly store: IEventStore;
  private readonly source: EventSource;
  private readonly ttlMs: number;
  private readonly rateLimitMs: number;
  private readonly listOptions: ListOptions;
  private readonly now: Clock;
  private readonly sleep: (ms: number) => Promise<void>;
  private current: RefreshState = { status: "idle", lastOutcome: null };
  private inFlight: Promise<void> | null = null;

  constructor(options: RefreshOrchestratorOptions) {
    this.store = options.store;
    this.source = options.source;
    this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;
    this.rateLimitMs = options.rateLimitMs ?? DEFAULT_RATE_LIMIT_MS;
    this.listOptions = options.listOptions ?? {};
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep ?? sleep;
  }

  get state(): Readonly<RefreshState> {
    return this.current;
  }

  get isRunning() {
    return this.current.status === "running";
  }

  get ttlMinutes() {
    return Math.round(this.ttlMs / 60_000);
  }

  async isStale(): Promise<boolean> {
    const lastCompletion = await this.store.lastCompletion();
    if (!lastCompletion) return true;
    return this.now().getTime() - lastCompletion.getTime() > this.ttlMs;
  }

  /**
   * Starts a cycle in the background. Returns false, and does nothing,
   * when one is already running.
   */
  tryStartRefresh(): boolean {
    if (this.isRunning) return false;
    this.inFlight = this.refreshNow().then(() => undefined);
    return true;
  }

  /** Checks staleness, then starts a background cycle when needed. */
  async maybeRefresh(): Promise<boolean> {
    if (this.isRunning) return false;
    if (!(await this.isStale())) return false;
    return this.tryStartRefresh();
  }

  /**
   * Runs one cycle to its end and reports it. Resolves to null without
   * doing anything when a cycle is already running.
   */
  async refreshNow(): Promise<RefreshOutcome | null> {
    if (this.isRunning) return null;

    // The guard is taken before the first await, so no second caller can slip in.
    const refreshTime = this.now();
    const lastOutcome = this.current.lastOutcome;
    this.current = { status: "running", refreshTime, processed: 0, total: null, lastOutcome };
    let outcome: RefreshOutcome | null = null;
    try {
      outcome = await this.runCycle(refreshTime);
      return outcome;
    } finally {
      this.current = { status: "idle", lastOutcome: outcome ?? lastOutcome };
    }
  }

  /** Resolves once the background cycle started by `tryStartRefresh` has settled. */
  async whenIdle(): Promise<void> {
    while (this.inFlight) {
      const pending = this.inFlight;
      await pending;
      if (this.inFlight === pending) this.inFlight = null;
    }
  }

  private async runCycle(refreshTime: Date): Promise<RefreshOutcome> {
    const counts: RefreshCounts = { newCount: 0, updatedCount: 0, skippedCount: 0, pastCount: 0 };
    const fail = (stage: RefreshStage, error: unknown): RefreshOutcome => {
      const message = errorMessage(error);
      log(
        `Refresh failed during ${stage}: ${message} (keeping ${counts.newCount} new, ${counts.updatedCount} updated)`,
        "refresh",
      );
      return { status: "failed", refreshTime, finishedAt: this.now(), stage, error: message, ...counts };
    };

    let queue: RefreshQueue;
    try {
      const existingIds = await this.store.existingIds();
      const urls = await this.source.listEventReferences(this.listOptions);
      queue = RefreshQueue.partition(urls, existingIds);
      log(
        `Starting refresh: ${queue.size} listed (${queue.newUrls.length} new first, ${existingIds.size} cached)`,
        "refresh",
      );
    } catch (error) {
      return fail("listing", error);
    }

    this.setProgress(0, queue.size);
    try {
      for (const entry of queue.entries()) {
        const result = await this.source.fetchEventDetail(entry.url);
        if (result.kind === "event") {
          const written = await this.store.upsert(result.event, refreshTime);
          if (!written) {
            counts.pastCount += 1;
          } else if (entry.phase === "new") {
            counts.newCount += 1;
          } else {
            counts.updatedCount += 1;
          }
        } else {
          counts.skippedCount += 1;
        }

        this.setProgress(entry.position, queue.size);
        if (entry.position % PROGRESS_EVERY === 0 || entry.position === queue.size) {
          log(
            `Progress: ${entry.position}/${queue.size} (new: ${counts.newCount}, updated: ${counts.updatedCount}, skipped: ${counts.skippedCount})`,
            "refresh",
          );
        }

        await this.sleep(this.rateLimitMs);
      }
    } catch (error) {
      return fail("scrape", error);
    }

    try {
      const retired = await this.store.retireStale(refreshTime);
      await this.store.markRefreshComplete();
      log(
        `Refresh complete: ${counts.newCount} new, ${counts.updatedCount} updated, ` +
          `${retired.retiredByAge} gone from source, ${retired.retiredByDate} past`,
        "refresh",
      );
      return {
        status: "completed",
        refreshTime,
        finishedAt: this.now(),
        total: queue.size,
        retired,
        ...counts,
      };
    } catch (error) {
      return fail("retire", error);
    }
  }

  private setProgress(processed: number, total: number) {
    if (this.current.status === "running") {
      this.current = { ...this.current, processed, total };
    }
  }
}
