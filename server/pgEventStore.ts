import { and, asc, count, desc, eq, isNotNull, lt, lte, ne, sql, type SQL } from "drizzle-orm";
import {
  cacheMeta,
  events,
  LAST_UPDATE_KEY,
  type Event,
  type EventFilters,
  type FacetCount,
  type FacetField,
} from "@shared/schema";
import { escapeLikePattern, normalizeFilterText } from "@shared/utils";
import type { Database } from "./db";
import {
  isPastEvent,
  stripBookkeeping,
  type Clock,
  type IEventStore,
  type RetirementResult,
} from "./storage";

const facetColumns = {
  country: events.country,
  sport: events.sport,
} as const;

function filterConditions(filters: Omit<EventFilters, "limit">): SQL[] {
  const conditions: SQL[] = [];
  if (filters.country) {
    const pattern = `%${escapeLikePattern(normalizeFilterText(filters.country))}%`;
    conditions.push(sql`lower(${events.country}) like ${pattern}`);
  }
  if (filters.sport) {
    const pattern = `%${escapeLikePattern(normalizeFilterText(filters.sport))}%`;
    conditions.push(sql`lower(${events.sport}) like ${pattern}`);
  }
  if (filters.startsBefore) {
    conditions.push(lte(events.startDate, filters.startsBefore));
  }
  return conditions;
}

export function upsertEventQuery(database: Database, event: Event, refreshTime: Date) {
  const { id: _id, ...fields } = event;
  return database
    .insert(events)
    .values({ ...event, updatedAt: refreshTime })
    .onConflictDoUpdate({
      target: events.id,
      set: { ...fields, updatedAt: refreshTime },
    });
}

/** Rows the cycle at `refreshTime` did not write. */
export function retireByAgeQuery(database: Database, refreshTime: Date) {
  return database
    .delete(events)
    .where(lt(events.updatedAt, refreshTime))
    .returning({ id: events.id });
}

export function retireByDateQuery(database: Database, now: Date) {
  return database
    .delete(events)
    .where(lt(events.startDate, now))
    .returning({ id: events.id });
}

export function eventsQuery(database: Database, filters: EventFilters = {}) {
  const base = database
    .select()
    .from(events)
    .where(and(...filterConditions(filters)))
    .orderBy(asc(events.startDate))
    .$dynamic();
  return filters.limit ? base.limit(filters.limit) : base;
}

export function facetQuery(
  database: Database,
  field: FacetField,
  filters: Omit<EventFilters, "limit"> = {},
) {
  const column = facetColumns[field];
  return database
    .select({ value: column, count: count() })
    .from(events)
    .where(and(isNotNull(column), ne(column, ""), ...filterConditions(filters)))
    .groupBy(column)
    .orderBy(desc(count()), asc(column));
}

export function countQuery(database: Database, filters: Omit<EventFilters, "limit"> = {}) {
  return database
    .select({ count: count() })
    .from(events)
    .where(and(...filterConditions(filters)));
}

export class PgEventStore implements IEventStore {
  private readonly now: Clock;

  constructor(
    private readonly database: Database,
    options: { now?: Clock } = {},
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async existingIds(): Promise<Set<string>> {
    const rows = await this.database.select({ id: events.id }).from(events);
    return new Set(rows.map((row) => row.id));
  }

  async upsert(event: Event, refreshTime: Date): Promise<boolean> {
    if (isPastEvent(event, this.now())) {
      return false;
    }

    await upsertEventQuery(this.database, event, refreshTime);
    return true;
  }

  async retireStale(refreshTime: Date): Promise<RetirementResult> {
    const byAge = await retireByAgeQuery(this.database, refreshTime);
    const byDate = await retireByDateQuery(this.database, this.now());
    return { retiredByAge: byAge.length, retiredByDate: byDate.length };
  }

  async markRefreshComplete(): Promise<Date> {
    const completedAt = this.now();
    await this.database
      .insert(cacheMeta)
      .values({ key: LAST_UPDATE_KEY, value: completedAt.toISOString() })
      .onConflictDoUpdate({
        target: cacheMeta.key,
        set: { value: completedAt.toISOString() },
      });
    return completedAt;
  }

  async lastCompletion(): Promise<Date | null> {
    const [row] = await this.database
      .select({ value: cacheMeta.value })
      .from(cacheMeta)
      .where(eq(cacheMeta.key, LAST_UPDATE_KEY));
    if (!row?.value) return null;
    const date = new Date(row.value);
    return Number.isNaN(date.getTime()) ? null : date;
  }

  async query(filters: EventFilters = {}): Promise<Event[]> {
    const rows = await eventsQuery(this.database, filters);
    return rows.map(stripBookkeeping);
  }

  async countDistinct(
    field: FacetField,
    filters: Omit<EventFilters, "limit"> = {},
  ): Promise<FacetCount[]> {
    const rows = await facetQuery(this.database, field, filters);

    const facets: FacetCount[] = [];
    for (const row of rows) {
      if (row.value) facets.push({ value: row.value, count: row.count });
    }
    return facets;
  }

  async totalCount(filters: Omit<EventFilters, "limit"> = {}): Promise<number> {
    const [row] = await countQuery(this.database, filters);
    return row?.count ?? 0;
  }
}
