// src/db/index.ts
import { Pool, type QueryResultRow } from "pg";
import { cfg } from "../config";

export const pool = new Pool({
  connectionString: cfg.pg.connectionString,
  ssl: cfg.pg.ssl,
  max: cfg.pg.maxConnections,
  idleTimeoutMillis: cfg.pg.idleTimeoutMs
});

// simple helper
export async function q<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<{ rows: T[] }> {
  const client = await pool.connect();
  try {
    return await client.query<T>(text, params);
  } finally {
    client.release();
  }
}

/** Throws when the database cannot answer a trivial query. */
export async function healthCheck(): Promise<void> {
  await q("SELECT 1");
}
