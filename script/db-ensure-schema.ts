import pg from "pg";
import { loadConfig } from "../server/config";
import { ensureEventSchema } from "../server/schemaEnsure";

const { Pool } = pg;

async function main() {
  const { databaseUrl } = loadConfig();
  if (!databaseUrl) throw new Error("DATABASE_URL is required");

  const pool = new Pool({ connectionString: databaseUrl });
  const client = await pool.connect();
  try {
    await ensureEventSchema({ query: (text, values) => client.query(text, values) });
    console.log("OK: ensured event cache schema");
  } finally {
    client.release();
    await pool.end();
  }
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
