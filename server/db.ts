import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import pg from "pg";
import * as schema from "@shared/schema";

const { Pool } = pg;

export type Database = NodePgDatabase<typeof schema>;

let pool: pg.Pool | null = null;
let database: Database | null = null;

/**
 * Lazily open the pool. Only the database telemetry sink needs Postgres, so
 * nothing connects until it is asked for.
 */
export function getDb(): Database {
  if (database) return database;

  const connectionString = process.env.DATABASE_URL;
  if (!connectionString) {
    throw new Error(
      "DATABASE_URL must be set to use the database telemetry sink. Did you forget to provision a database?",
    );
  }

  // Managed Postgres commonly requires SSL; local dev typically does not.
  const shouldUseSsl =
    !connectionString.includes("localhost") &&
    !connectionString.includes("127.0.0.1") &&
    !connectionString.includes("0.0.0.0");

  pool = new Pool({
    connectionString,
    ...(shouldUseSsl ? { ssl: { rejectUnauthorized: false } } : {}),
    max: 10,
    connectionTimeoutMillis: 8000,
    idleTimeoutMillis: 30000,
    keepAlive: true,
  });

  // A broken idle client is dropped by the pool; don't crash the process
  pool.on("error", (err) => {
    console.error("[DB Pool] Unexpected error on idle client:", err.message);
  });

  database = drizzle(pool, { schema });
  return database;
}

export async function closePool(): Promise<void> {
  if (!pool) return;
  console.log("[DB Pool] Closing connections...");
  await pool.end();
  pool = null;
  database = null;
  console.log("[DB Pool] All connections closed");
}
