import type {
  CachedEvent,
  Event,
  EventFilters,
  FacetCount,
  FacetField,
} from "@shared/schema";
import { matchesFilter } from "@shared/utils";

export type Clock = () => Date;

export interface RetirementResult {
  retiredByAge: number;
  retiredByDate: number;
}

/**
 * Durable home of cached events and the last-refresh marker.
 * Every call is individually atomic and visible to the next read.
 */
export interface IEventStore {
  existingIds(): Promise<Set<string>>;
  /** Returns false when the event starts in the past and was not written. */
  upsert(event: Event, refreshTime: Date): Promise<boolean>;
  retireStale(refreshTime: Date): Promise<RetirementResult>;
  markRefreshComplete(): Promise<Date>;
  lastCompletion(): Promise<Date | null>;
  query(filters?: EventFilters): Promise<Event[]>;
  countDistinct(field: FacetField, filters?: Omit<EventFilters, "limit">): Promise<FacetCount[]>;
  totalCount(filters?: Omit<EventFilters, "limit">): Promise<number>;
}

export function isPastEvent(event: Pick<Event, "startDate">, now: Date) {
  return event.startDate !== null && event.startDate.getTime() < now.getTime();
}

export function stripBookkeeping({ updatedAt: _updatedAt, ...event }: CachedEvent): Event {
  return event;
}

function startsBefore(event: CachedEvent, limit?: Date) {
  if (!limit) return true;
  return event.startDate !== null && event.startDate.getTime() <= limit.getTime();
}

function compareByStartDate(a: CachedEvent, b: CachedEvent) {
  // Undated events sort last, like ORDER BY start_date ASC in Postgres.
  if (!a.startDate && !b.startDate) return 0;
  if (!a.startDate) return 1;
  if (!b.startDate) return -1;
  return a.startDate.getTime() - b.startDate.getTime();
}

export class MemEventStore implements IEventStore {
  private events: Map<string, CachedEvent>;
  private lastUpdate: Date | null;
  private readonly now: Clock;

  constructor(options: { now?: Clock } = {}) {
    this.events = new Map();
    this.lastUpdate = null;
    this.now = options.now ?? (() => new Date());
  }

  async existingIds(): Promise<Set<string>> {
    return new Set(this.events.keys());
  }

  async upsert(event: Event, refreshTime: Date): Promise<boolean> {
    if (isPastEvent(event, this.now())) {
      return false;
    }
    this.events.set(event.id, { ...event, updatedAt: refreshTime });
    return true;
  }

  async retireStale(refreshTime: Date): Promise<RetirementResult> {
    let retiredByAge = 0;
    for (const [id, event] of Array.from(this.events)) {
      if (event.updatedAt.getTime() < refreshTime.getTime()) {
        this.events.delete(id);
        retiredByAge += 1;
      }
    }

    const now = this.now();
    let retiredByDate = 0;
    for (const [id, event] of Array.from(this.events)) {
      if (isPastEvent(event, now)) {
        this.events.delete(id);
        retiredByDate += 1;
      }
    }
    return { retiredByAge, retiredByDate };
  }

  async markRefreshComplete(): Promise<Date> {
    this.lastUpdate = this.now();
    return this.lastUpdate;
  }

  async lastCompletion(): Promise<Date | null> {
    return this.lastUpdate;
  }

  async query(filters: EventFilters = {}): Promise<Event[]> {
    const matching = this.filtered(filters).sort(compareByStartDate);
    const limited = filters.limit ? matching.slice(0, filters.limit) : matching;
    return limited.map(stripBookkeeping);
  }

  async countDistinct(
    field: FacetField,
    filters: Omit<EventFilters, "limit"> = {},
  ): Promise<FacetCount[]> {
    const counts = new Map<string, number>();
    for (const event of this.filtered(filters)) {
      const value = event[field];
      if (!value) continue;
      counts.set(value, (counts.get(value) ?? 0) + 1);
    }
    return Array.from(counts, ([value, count]) => ({ value, count })).sort(
      (a, b) => b.count - a.count || (a.value < b.value ? -1 : a.value > b.value ? 1 : 0),
    );
  }

  async totalCount(filters: Omit<EventFilters, "limit"> = {}): Promise<number> {
    return this.filtered(filters).length;
  }

  private filtered(filters: Omit<EventFilters, "limit">) {
    return Array.from(this.events.values()).filter(
      (event) =>
        matchesFilter(event.country, filters.country) &&
        matchesFilter(event.sport, filters.sport) &&
        startsBefore(event, filters.startsBefore),
    );
  }
}
