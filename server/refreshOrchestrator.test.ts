import { describe, it, expect, vi, beforeEach } from "vitest";
import { RefreshOrchestrator } from "./refreshOrchestrator";
import { MemEventStore } from "./storage";
import { eventUrl, FakeEventSource, makeEvent } from "./testUtils";

const START = new Date("2030-01-01T00:00:00Z");
const EARLIER = new Date("2029-12-31T00:00:00Z");

describe("RefreshOrchestrator", () => {
  let clock: Date;
  let store: MemEventStore;
  const now = () => clock;

  beforeEach(() => {
    clock = START;
    store = new MemEventStore({ now });
  });

  function orchestrator(source: FakeEventSource, sleep = vi.fn(async (_ms: number) => {})) {
    return new RefreshOrchestrator({ store, source, now, sleep, rateLimitMs: 250 });
  }

  it("processes unseen events before known ones", async () => {
    const known = makeEvent("101");
    const unseen = makeEvent("102");
    await store.upsert(known, EARLIER);
    const source = new FakeEventSource([known.url, unseen.url]).addEvent(known).addEvent(unseen);

    const outcome = await orchestrator(source).refreshNow();

    expect(source.fetched).toEqual([unseen.url, known.url]);
    expect(outcome).toMatchObject({ status: "completed", newCount: 1, updatedCount: 1, total: 2 });
  });

  it("retires events the source no longer lists and marks completion", async () => {
    const kept = makeEvent("201");
    const gone = makeEvent("202");
    await store.upsert(kept, EARLIER);
    await store.upsert(gone, EARLIER);
    const source = new FakeEventSource([kept.url]).addEvent(kept);

    const outcome = await orchestrator(source).refreshNow();

    expect(outcome).toMatchObject({
      status: "completed",
      retired: { retiredByAge: 1, retiredByDate: 0 },
    });
    expect(await store.existingIds()).toEqual(new Set(["201"]));
    expect(await store.lastCompletion()).toEqual(START);
  });

  it("sweeps events whose start time passed while the cycle ran", async () => {
    const soon = makeEvent("301", { startDate: new Date("2030-01-01T00:00:30Z") });
    const source = new FakeEventSource([soon.url]).addEvent(soon);
    const sleep = vi.fn(async (_ms: number) => {
      clock = new Date(clock.getTime() + 60_000);
    });

    const outcome = await orchestrator(source, sleep).refreshNow();

    expect(outcome).toMatchObject({
      status: "completed",
      newCount: 1,
      retired: { retiredByAge: 0, retiredByDate: 1 },
    });
    expect(await store.totalCount()).toBe(0);
  });

  it("keeps prior and partial data when the cycle fails midway", async () => {
    const known = makeEvent("401");
    const untouched = makeEvent("402");
    const unseen = makeEvent("403");
    await store.upsert(known, EARLIER);
    await store.upsert(untouched, EARLIER);
    const source = new FakeEventSource([known.url, unseen.url]).addEvent(unseen);
    source.pages.set(known.url, new Error("connection reset"));

    const refresher = orchestrator(source);
    const outcome = await refresher.refreshNow();

    expect(outcome).toMatchObject({ status: "failed", stage: "scrape", error: "connection reset", newCount: 1 });
    expect(await store.existingIds()).toEqual(new Set(["401", "402", "403"]));
    expect(await store.lastCompletion()).toBeNull();
    expect(refresher.isRunning).toBe(false);
  });

  it("aborts without touching the store when the listing fails", async () => {
    const known = makeEvent("501");
    await store.upsert(known, EARLIER);
    const source = new FakeEventSource(new Error("HTTP 503"));

    const outcome = await orchestrator(source).refreshNow();

    expect(outcome).toMatchObject({ status: "failed", stage: "listing", error: "HTTP 503" });
    expect(source.fetched).toEqual([]);
    expect(await store.existingIds()).toEqual(new Set(["501"]));
    expect(await store.lastCompletion()).toBeNull();
  });

  it("skips unreachable pages and still waits after each fetch", async () => {
    const good = makeEvent("601");
    const source = new FakeEventSource([eventUrl("600"), good.url]).addEvent(good);
    const sleep = vi.fn(async (_ms: number) => {});

    const outcome = await orchestrator(source, sleep).refreshNow();

    expect(outcome).toMatchObject({ status: "completed", newCount: 1, skippedCount: 1 });
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(250);
  });

  it("does not write events that already started", async () => {
    const past = makeEvent("701", { startDate: new Date("2029-12-01T00:00:00Z") });
    const source = new FakeEventSource([past.url]).addEvent(past);

    const outcome = await orchestrator(source).refreshNow();

    expect(outcome).toMatchObject({ status: "completed", newCount: 0, pastCount: 1 });
    expect(await store.totalCount()).toBe(0);
  });

  it("runs at most one cycle at a time", async () => {
    let releaseListing: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      releaseListing = resolve;
    });
    const source = new FakeEventSource([]);
    const list = vi.spyOn(source, "listEventReferences").mockImplementation(async () => {
      await gate;
      return [];
    });
    const refresher = orchestrator(source);

    expect(refresher.tryStartRefresh()).toBe(true);
    expect(refresher.isRunning).toBe(true);
    expect(refresher.state.status).toBe("running");
    expect(refresher.tryStartRefresh()).toBe(false);
    expect(await refresher.refreshNow()).toBeNull();

    releaseListing();
    await refresher.whenIdle();

    expect(list).toHaveBeenCalledTimes(1);
    expect(refresher.isRunning).toBe(false);
    expect(refresher.state.lastOutcome).toMatchObject({ status: "completed", total: 0 });
  });

  it("reports staleness against the ttl", async () => {
    const refresher = new RefreshOrchestrator({
      store,
      source: new FakeEventSource(),
      ttlMs: 60 * 60 * 1000,
      now,
    });

    expect(await refresher.isStale()).toBe(true);
    await store.markRefreshComplete();
    expect(await refresher.isStale()).toBe(false);

    clock = new Date(START.getTime() + 60 * 60 * 1000);
    expect(await refresher.isStale()).toBe(false);

    clock = new Date(START.getTime() + 61 * 60 * 1000);
    expect(await refresher.isStale()).toBe(true);
  });

  it("starts a background cycle only when stale", async () => {
    const source = new FakeEventSource([]);
    const refresher = orchestrator(source);

    await store.markRefreshComplete();
    expect(await refresher.maybeRefresh()).toBe(false);

    clock = new Date(START.getTime() + 2 * 60 * 60 * 1000);
    expect(await refresher.maybeRefresh()).toBe(true);
    await refresher.whenIdle();
    expect(await store.lastCompletion()).toEqual(clock);
  });
});
