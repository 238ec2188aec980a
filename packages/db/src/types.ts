/**
 * Database Type Definitions
 */

import type { QueryResultRow } from "pg";
import type { LinkRecord, NewLinkRecord } from "@linkvault/shared";

/**
 * Minimal pg.Pool interface (what we actually use).
 * Allows mocking without a running PostgreSQL.
 */
export interface SqlClient {
  query<T extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[]
  ): Promise<{ rows: T[]; rowCount: number | null }>;
  end(): Promise<void>;
}

/**
 * Database row shape for the links table
 */
export interface LinkRow {
  id: string;
  target_url: string;
  expires_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

/**
 * Authoritative store for link records.
 *
 * `save` throws DuplicateLinkError when the ID is already taken; every
 * other failure propagates unchanged.
 */
export interface LinkRepository {
  exists(id: string): Promise<boolean>;
  findById(id: string): Promise<LinkRecord | null>;
  save(record: NewLinkRecord): Promise<LinkRecord>;
  deleteById(id: string): Promise<void>;
  delete(record: LinkRecord): Promise<void>;
  /** Records whose expiry is set and at or before `timestamp` */
  findAllWithExpiryBefore(timestamp: Date): Promise<LinkRecord[]>;
  ping(): Promise<boolean>;
}
