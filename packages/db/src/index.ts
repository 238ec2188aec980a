/**
 * @linkvault/db - Database Package
 *
 * PostgreSQL pool and the link record repository.
 *
 * Usage:
 * ```ts
 * import { createPool, PgLinkRepository } from "@linkvault/db";
 *
 * const pool = createPool({ connectionString: config.databaseUrl });
 * const links = new PgLinkRepository(pool);
 * const link = await links.findById("abc123");
 * ```
 */

export * from "./client.js";
export * from "./errors.js";
export * from "./repository.js";
export * from "./types.js";
