import { log } from "./logger";

/** The slice of `pg.Pool` the schema bootstrap needs. */
export interface SqlClient {
  query(
    text: string,
    values?: unknown[],
  ): Promise<{ rowCount: number | null; rows: unknown[] }>;
}

async function tableExists(client: SqlClient, table: string) {
  const result = await client.query(
    `
    select 1
    from information_schema.tables
    where table_schema = 'public'
      and table_name = $1
    limit 1
  `,
    [table],
  );
  return (result.rowCount ?? 0) > 0;
}

async function columnExists(client: SqlClient, table: string, column: string) {
  const result = await client.query(
    `
    select 1
    from information_schema.columns
    where table_schema = 'public'
      and table_name = $1
      and column_name = $2
    limit 1
  `,
    [table, column],
  );
  return (result.rowCount ?? 0) > 0;
}

async function ensureEventsTable(client: SqlClient) {
  if (await tableExists(client, "events")) {
    // Older stores tracked freshness in cached_at; keep the data, rename the column.
    if (await columnExists(client, "events", "cached_at")) {
      await client.query("alter table events rename column cached_at to updated_at");
      log("Renamed events.cached_at to updated_at", "db");
    }
    if (!(await columnExists(client, "events", "updated_at"))) {
      await client.query(
        "alter table events add column updated_at timestamptz not null default now()",
      );
      log("Added events.updated_at", "db");
    }
    return;
  }

  await client.query(`
    create table events (
      id text primary key,
      name text not null,
      url text not null,
      start_date timestamptz,
      end_date timestamptz,
      location text,
      city text,
      country text,
      sport text,
      organizer text,
      participants integer,
      registration_open boolean not null default true,
      updated_at timestamptz not null default now()
    );
  `);
  log("Created events table", "db");
}

/**
 * Create or additively migrate the cache tables. Safe to run on every boot.
 */
export async function ensureEventSchema(client: SqlClient) {
  await client.query("begin");
  try {
    await ensureEventsTable(client);
    await client.query("create index if not exists idx_events_country on events (country)");
    await client.query("create index if not exists idx_events_start_date on events (start_date)");
    await client.query("create index if not exists idx_events_updated_at on events (updated_at)");
    await client.query(`
      create table if not exists cache_meta (
        key text primary key,
        value text
      );
    `);
    await client.query("commit");
  } catch (error) {
    await client.query("rollback");
    throw error;
  }
}
