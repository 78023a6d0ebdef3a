import type { Event, EventQuery, FilterOptionsQuery } from "@shared/schema";
import type { RefreshOrchestrator, RefreshOutcome } from "./refreshOrchestrator";
import type { Clock, IEventStore } from "./storage";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface CountryCount {
  country: string;
  count: number;
}

export interface SportCount {
  sport: string;
  count: number;
}

export interface FilterOptions {
  eventCount: number;
  sports: SportCount[] | null;
  countries: CountryCount[] | null;
}

export interface CacheStatus {
  healthy: boolean;
  eventCount: number;
  lastUpdate: string | null;
  cacheAgeMinutes: number | null;
  autoRefreshThresholdMinutes: number;
  scrapingInProgress: boolean;
  lastOutcome: RefreshOutcome | null;
}

/**
 * Read side of the cache. Never waits on a running refresh; readers see
 * whatever the store holds right now.
 */
export class EventService {
  constructor(
    private readonly store: IEventStore,
    private readonly refresher: RefreshOrchestrator,
    private readonly now: Clock = () => new Date(),
  ) {}

  async getEvents(query: EventQuery = {}): Promise<Event[]> {
    return this.store.query({
      country: query.country,
      sport: query.sport,
      limit: query.limit,
      startsBefore: query.days ? new Date(this.now().getTime() + query.days * DAY_MS) : undefined,
    });
  }

  async getCountries(): Promise<CountryCount[]> {
    const facets = await this.store.countDistinct("country");
    return facets.map(({ value, count }) => ({ country: value, count }));
  }

  async getSports(): Promise<SportCount[]> {
    const facets = await this.store.countDistinct("sport");
    return facets.map(({ value, count }) => ({ sport: value, count }));
  }

  /**
   * Counts for the filter dropdowns: each facet is narrowed by the other
   * selection and only computed when that other selection is present.
   */
  async getFilterOptions(query: FilterOptionsQuery = {}): Promise<FilterOptions> {
    const eventCount = await this.store.totalCount({
      country: query.country,
      sport: query.sport,
    });

    let sports: SportCount[] | null = null;
    if (query.country) {
      const facets = await this.store.countDistinct("sport", { country: query.country });
      sports = facets.map(({ value, count }) => ({ sport: value, count }));
    }

    let countries: CountryCount[] | null = null;
    if (query.sport) {
      const facets = await this.store.countDistinct("country", { sport: query.sport });
      countries = facets.map(({ value, count }) => ({ country: value, count }));
    }

    return { eventCount, sports, countries };
  }

  async getStatus(): Promise<CacheStatus> {
    const lastUpdate = await this.store.lastCompletion();
    const eventCount = await this.store.totalCount();
    const cacheAgeMinutes = lastUpdate
      ? Math.floor((this.now().getTime() - lastUpdate.getTime()) / 60_000)
      : null;

    return {
      healthy: true,
      eventCount,
      lastUpdate: lastUpdate ? lastUpdate.toISOString() : null,
      cacheAgeMinutes,
      autoRefreshThresholdMinutes: this.refresher.ttlMinutes,
      scrapingInProgress: this.refresher.isRunning,
      lastOutcome: this.refresher.state.lastOutcome,
    };
  }
}
