/**
 * Link Repository - PostgreSQL
 *
 * Authoritative storage for link records.
 *
 * The PRIMARY KEY on `links.id` is the final guard against duplicate IDs;
 * the service's existence check is only a fast path.
 */

import type { LinkRecord, NewLinkRecord } from "@linkvault/shared";
import { createLogger } from "@linkvault/logger";
import { DuplicateLinkError, isUniqueViolation } from "./errors.js";
import type { LinkRepository, LinkRow, SqlClient } from "./types.js";

const log = createLogger("db");

// Slow query threshold (ms)
const SLOW_QUERY_THRESHOLD_MS = 100;

// =============================================================================
// SQL Queries
// =============================================================================

const COLUMNS = "id, target_url, expires_at, created_at, updated_at";

const EXISTS_QUERY = "SELECT 1 FROM links WHERE id = $1 LIMIT 1";

const FIND_BY_ID_QUERY = `SELECT ${COLUMNS} FROM links WHERE id = $1 LIMIT 1`;

const INSERT_QUERY = `
  INSERT INTO links (id, target_url, expires_at)
  VALUES ($1, $2, $3)
  RETURNING ${COLUMNS}
`;

const DELETE_QUERY = "DELETE FROM links WHERE id = $1";

const EXPIRED_QUERY = `
  SELECT ${COLUMNS}
  FROM links
  WHERE expires_at IS NOT NULL
    AND expires_at <= $1
  ORDER BY expires_at
`;

// =============================================================================
// Mapping
// =============================================================================

/**
 * Convert a snake_case row to a LinkRecord
 */
export function mapLinkRow(row: LinkRow): LinkRecord {
  return {
    id: row.id,
    targetUrl: row.target_url,
    expiresAt: row.expires_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

// =============================================================================
// Repository
// =============================================================================

export class PgLinkRepository implements LinkRepository {
  constructor(private readonly client: SqlClient) {}

  async exists(id: string): Promise<boolean> {
    const result = await this.timed("exists", () => this.client.query(EXISTS_QUERY, [id]));
    return result.rows.length > 0;
  }

  async findById(id: string): Promise<LinkRecord | null> {
    const result = await this.timed("findById", () =>
      this.client.query<LinkRow>(FIND_BY_ID_QUERY, [id])
    );
    const row = result.rows[0];
    return row ? mapLinkRow(row) : null;
  }

  async save(record: NewLinkRecord): Promise<LinkRecord> {
    try {
      const result = await this.timed("save", () =>
        this.client.query<LinkRow>(INSERT_QUERY, [record.id, record.targetUrl, record.expiresAt])
      );
      const row = result.rows[0];
      if (!row) {
        throw new Error(`Insert of link "${record.id}" returned no row`);
      }
      return mapLinkRow(row);
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw new DuplicateLinkError(record.id, { cause: err });
      }
      throw err;
    }
  }

  async deleteById(id: string): Promise<void> {
    await this.timed("deleteById", () => this.client.query(DELETE_QUERY, [id]));
  }

  async delete(record: LinkRecord): Promise<void> {
    await this.deleteById(record.id);
  }

  async findAllWithExpiryBefore(timestamp: Date): Promise<LinkRecord[]> {
    const result = await this.timed("findAllWithExpiryBefore", () =>
      this.client.query<LinkRow>(EXPIRED_QUERY, [timestamp])
    );
    return result.rows.map(mapLinkRow);
  }

  async ping(): Promise<boolean> {
    try {
      await this.client.query("SELECT 1");
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Run a query and log it when it exceeds the slow threshold
   */
  private async timed<T>(operation: string, run: () => Promise<T>): Promise<T> {
    const start = performance.now();
    const result = await run();
    const duration = performance.now() - start;

    if (duration > SLOW_QUERY_THRESHOLD_MS) {
      log.warn({ operation, duration: Math.round(duration) }, "Slow query");
    }

    return result;
  }
}
