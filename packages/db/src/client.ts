/**
 * PostgreSQL Pool Factory
 *
 * Raw SQL over `pg` - no ORM.
 *
 * Connection Pooling Strategy:
 * - One pg.Pool per process, shared by the API and the expiry sweeper
 * - Statement and client-side query timeouts so no call blocks indefinitely
 */

import { Pool } from "pg";
import { createLogger } from "@linkvault/logger";
import type { SqlClient } from "./types.js";

const log = createLogger("db");

export interface DbPoolOptions {
  /** PostgreSQL connection string */
  connectionString: string;
  /** Query timeout in ms (default: 2000) */
  queryTimeoutMs?: number;
  /** Maximum connections (default: 10) */
  max?: number;
}

/**
 * Table definition for link records.
 * Applied idempotently on startup.
 */
export const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS links (
    id          VARCHAR(64)  PRIMARY KEY,
    target_url  TEXT         NOT NULL,
    expires_at  TIMESTAMPTZ  NULL,
    created_at  TIMESTAMPTZ  NOT NULL DEFAULT NOW(),
    updated_at  TIMESTAMPTZ  NOT NULL DEFAULT NOW()
  );
  CREATE INDEX IF NOT EXISTS links_expires_at_idx
    ON links (expires_at) WHERE expires_at IS NOT NULL;
`;

const HEALTH_QUERY = "SELECT 1";

/**
 * Create a configured connection pool. Does not connect until first query.
 */
export function createPool(options: DbPoolOptions): Pool {
  const { connectionString, queryTimeoutMs = 2000, max = 10 } = options;

  const pool = new Pool({
    connectionString,
    max,
    idleTimeoutMillis: 30000, // Close idle connections after 30s
    connectionTimeoutMillis: 2000, // Connection acquisition timeout
    statement_timeout: queryTimeoutMs, // PostgreSQL side
    query_timeout: queryTimeoutMs, // Node.js side
  });

  pool.on("error", (err) => {
    log.error({ err }, "Idle client error");
  });

  return pool;
}

/**
 * Create the links table and index if missing
 */
export async function ensureSchema(client: SqlClient): Promise<void> {
  await client.query(SCHEMA_SQL);
  log.info("Schema ready");
}

/**
 * Check database connectivity
 */
export async function checkDbConnection(client: SqlClient): Promise<boolean> {
  try {
    await client.query(HEALTH_QUERY);
    return true;
  } catch (err) {
    log.warn({ err }, "Database health check failed");
    return false;
  }
}

/**
 * Gracefully drain the pool
 */
export async function disconnectDb(client: SqlClient): Promise<void> {
  await client.end();
}
