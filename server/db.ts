import pg from "pg";
import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import { log } from "./logger";

export type Database = NodePgDatabase;

export function createDatabase(databaseUrl: string | undefined) {
  if (!databaseUrl) {
    log("DATABASE_URL is not set. Events are cached in memory only.", "db");
    return null;
  }
  const pool = new pg.Pool({ connectionString: databaseUrl, min: 2, max: 10 });
  return { pool, db: drizzle(pool) };
}
