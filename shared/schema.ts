import {
  boolean,
  index,
  integer,
  pgTable,
  text,
  timestamp,
} from "drizzle-orm/pg-core";
import { z } from "zod";

export const events = pgTable(
  "events",
  {
    id: text("id").primaryKey(),
    name: text("name").notNull(),
    url: text("url").notNull(),
    startDate: timestamp("start_date", { withTimezone: true }),
    endDate: timestamp("end_date", { withTimezone: true }),
    location: text("location"),
    city: text("city"),
    country: text("country"),
    sport: text("sport"),
    organizer: text("organizer"),
    participants: integer("participants"),
    registrationOpen: boolean("registration_open").default(true).notNull(),
    // Stamped with the refresh cycle that last wrote the row; drives retirement.
    updatedAt: timestamp("updated_at", { withTimezone: true })
      .defaultNow()
      .notNull(),
  },
  (table) => ({
    countryIdx: index("idx_events_country").on(table.country),
    startDateIdx: index("idx_events_start_date").on(table.startDate),
    updatedAtIdx: index("idx_events_updated_at").on(table.updatedAt),
  }),
);

export const cacheMeta = pgTable("cache_meta", {
  key: text("key").primaryKey(),
  value: text("value"),
});

export const LAST_UPDATE_KEY = "last_update";

export type CachedEvent = typeof events.$inferSelect;

/** A scraped event as the crawler produces it, before the store stamps it. */
export type Event = Omit<CachedEvent, "updatedAt">;

export type FacetField = "country" | "sport";

export interface EventFilters {
  country?: string;
  sport?: string;
  /** Only events starting at or before this instant. */
  startsBefore?: Date;
  limit?: number;
}

export interface FacetCount {
  value: string;
  count: number;
}

// Query parameter schemas
const optionalText = z.preprocess(
  (value) => (Array.isArray(value) ? value[0] : value),
  z
    .string()
    .trim()
    .max(100)
    .optional()
    .transform((value) => (value ? value : undefined)),
);

export const eventQuerySchema = z.object({
  country: optionalText,
  sport: optionalText,
  limit: z.preprocess(
    (value) => (Array.isArray(value) ? value[0] : value),
    z.coerce.number().int().min(1).max(1000).optional(),
  ),
  days: z.preprocess(
    (value) => (Array.isArray(value) ? value[0] : value),
    z.coerce.number().int().min(1).max(3650).optional(),
  ),
});

export const filterOptionsQuerySchema = eventQuerySchema.pick({
  country: true,
  sport: true,
});

export const subscribeQuerySchema = eventQuerySchema.pick({
  country: true,
  sport: true,
  days: true,
});

export type EventQuery = z.infer<typeof eventQuerySchema>;
export type FilterOptionsQuery = z.infer<typeof filterOptionsQuerySchema>;
export type SubscribeQuery = z.infer<typeof subscribeQuerySchema>;

export function toEventJson(event: Event) {
  return {
    ...event,
    startDate: event.startDate ? event.startDate.toISOString() : null,
    endDate: event.endDate ? event.endDate.toISOString() : null,
  };
}

export type EventJson = ReturnType<typeof toEventJson>;
