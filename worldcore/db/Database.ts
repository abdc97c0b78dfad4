// worldcore/db/Database.ts
//
// Postgres connectivity for the optional DB-backed item catalog.
//
// - The pool is only created when a connection string is configured.
// - Nothing connects at import time; callers await loadAll() / closeDbPool().

import { Pool } from "pg";
import { Logger } from "../utils/logger";

const log = Logger.scope("DB");

/**
 * The slice of pg the item loader actually uses. A Pool satisfies it,
 * and tests pass an in-memory object with the same method.
 */
export interface Queryable {
  query(text: string): Promise<{ rows: unknown[] }>;
}

/**
 * Shared Postgres connection pool.
 *
 * Notes:
 * - idleTimeoutMillis closes idle clients to avoid unbounded socket usage.
 * - connectionTimeoutMillis caps how long to wait for a new connection.
 */
export function createDbPool(connectionString: string, max = 4): Pool {
  const pool = new Pool({
    connectionString,
    max,
    idleTimeoutMillis: 30_000, // Close idle clients after 30s
    connectionTimeoutMillis: 5_000,
  });

  // The pool emits "error" on unexpected errors on idle clients.
  pool.on("error", (err: Error) => {
    log.error("Postgres pool error", err);
  });

  return pool;
}

export async function closeDbPool(pool: Pool): Promise<void> {
  try {
    await pool.end();
    log.info("Postgres pool closed");
  } catch (err) {
    log.warn("Postgres pool close failed", err);
  }
}
