/**
 * Link Service
 *
 * Business logic for the short link lifecycle: create, lookup, delete.
 *
 * Consistency model (cache-aside):
 * - The store is the source of truth for existence
 * - Cache entries are written after store writes and removed after store
 *   deletes, with no transaction spanning both
 * - Every cache entry carries a TTL, which bounds staleness
 * - Every read re-checks expiry against the record it found
 *
 * Cache writes and deletes are best-effort: a cache failure is logged and
 * the authoritative result is still returned.
 */

import type { LinkCache } from "@linkvault/cache";
import { DuplicateLinkError, type LinkRepository } from "@linkvault/db";
import { createLogger, type Logger } from "@linkvault/logger";
import {
  CACHE_CONFIG,
  TTL_CONFIG,
  buildShortUrl,
  generateShortId,
  isBlank,
  validateShortId,
  type LinkErrorCode,
  type LinkFailure,
  type LinkRecord,
  type LinkResult,
} from "@linkvault/shared";

// ============================================================================
// Types
// ============================================================================

export interface LinkServiceDeps {
  repository: LinkRepository;
  cache: LinkCache;
  /** Public origin prepended to IDs, e.g. "https://lnk.example.com" */
  baseUrl: string;
  /** Cache TTL for links created without a TTL, and for read-through fills */
  defaultCacheTtlHours?: number;
  generateId?: () => string;
  now?: () => Date;
  logger?: Logger;
}

export interface CreateLinkInput {
  /** Target URL, already validated upstream */
  targetUrl: string;
  /** Optional caller-chosen ID */
  customId?: string | null;
  /** Optional lifetime in whole hours; absent means never expires */
  ttlHours?: number | null;
}

export type CreateLinkResult = LinkResult<{
  link: LinkRecord;
  publicUrl: string;
  isCustom: boolean;
}>;

export type GetLinkResult = LinkResult<{
  link: LinkRecord;
  fromCache: boolean;
}>;

export type DeleteLinkResult = LinkResult;

export interface LinkService {
  createLink(input: CreateLinkInput): Promise<CreateLinkResult>;
  getLink(id: string): Promise<GetLinkResult>;
  deleteLink(id: string): Promise<DeleteLinkResult>;
  /** Lookup for redirects; same outcome as getLink */
  resolveRedirect(id: string): Promise<GetLinkResult>;
}

export const LINK_MESSAGES = {
  CONFLICT: "The provided ID already exists. Please choose a different ID.",
  NOT_FOUND: "The provided ID could not be found.",
  EXPIRED: "The requested short URL has expired and is no longer accessible.",
  INVALID_TTL: `TTL must be a whole number of hours between ${TTL_CONFIG.MIN_HOURS} and ${TTL_CONFIG.MAX_HOURS}`,
} as const;

const MS_PER_HOUR = 3_600_000;

// ============================================================================
// Helpers
// ============================================================================

function fail(errorCode: LinkErrorCode, error: string): LinkFailure {
  return { success: false, errorCode, error };
}

/**
 * A record is expired once the current time reaches its expiry.
 */
export function isExpired(record: Pick<LinkRecord, "expiresAt">, now: Date): boolean {
  return record.expiresAt !== null && record.expiresAt.getTime() <= now.getTime();
}

function isValidTtl(ttlHours: number): boolean {
  return Number.isInteger(ttlHours) && ttlHours >= TTL_CONFIG.MIN_HOURS && ttlHours <= TTL_CONFIG.MAX_HOURS;
}

// ============================================================================
// Link Service
// ============================================================================

export function createLinkService(deps: LinkServiceDeps): LinkService {
  const {
    repository,
    cache,
    baseUrl,
    defaultCacheTtlHours = CACHE_CONFIG.DEFAULT_TTL_HOURS,
    generateId = () => generateShortId(),
    now = () => new Date(),
    logger = createLogger("link-service"),
  } = deps;

  /**
   * Run a cache mutation, logging instead of propagating failures
   */
  async function bestEffort(action: "set" | "delete", id: string, op: () => Promise<void>): Promise<void> {
    try {
      await op();
    } catch (err) {
      logger.warn({ err, id, action }, "Cache write failed, continuing without cache");
    }
  }

  /**
   * Read from cache; a failing cache counts as a miss
   */
  async function readCache(id: string): Promise<LinkRecord | null> {
    try {
      return await cache.get(id);
    } catch (err) {
      logger.warn({ err, id }, "Cache read failed, falling back to store");
      return null;
    }
  }

  /**
   * Create a new short link
   */
  async function createLink(input: CreateLinkInput): Promise<CreateLinkResult> {
    const { targetUrl, customId, ttlHours } = input;

    let id: string;
    const isCustom = !isBlank(customId);

    if (!isBlank(customId)) {
      const validation = validateShortId(customId);
      if (!validation.valid) {
        return fail("BAD_REQUEST", `Invalid custom ID: ${validation.error}`);
      }
      id = customId;
    } else {
      id = generateId();
    }

    if (ttlHours !== undefined && ttlHours !== null && !isValidTtl(ttlHours)) {
      return fail("BAD_REQUEST", LINK_MESSAGES.INVALID_TTL);
    }

    // Fast-path conflict check; the store's primary key is the final guard
    if (await repository.exists(id)) {
      logger.warn({ id, isCustom }, "Short ID already exists");
      return fail("CONFLICT", LINK_MESSAGES.CONFLICT);
    }

    const expiresAt = ttlHours ? new Date(now().getTime() + ttlHours * MS_PER_HOUR) : null;

    let link: LinkRecord;
    try {
      link = await repository.save({ id, targetUrl, expiresAt });
    } catch (err) {
      if (err instanceof DuplicateLinkError) {
        logger.warn({ id, isCustom }, "Short ID taken between check and insert");
        return fail("CONFLICT", LINK_MESSAGES.CONFLICT);
      }
      throw err;
    }

    await bestEffort("set", id, () => cache.set(link, ttlHours ?? defaultCacheTtlHours));

    const publicUrl = buildShortUrl(baseUrl, id);
    logger.info({ id, isCustom, expiresAt }, "Link created");

    return { success: true, link, publicUrl, isCustom };
  }

  /**
   * Get a link by ID: cache first, then store with read-through fill
   */
  async function getLink(id: string): Promise<GetLinkResult> {
    const cached = await readCache(id);

    if (cached) {
      // A cached record is trusted for the expiry decision
      if (isExpired(cached, now())) {
        await bestEffort("delete", id, () => cache.delete(id));
        logger.warn({ id, source: "cache" }, "Link expired");
        return fail("EXPIRED", LINK_MESSAGES.EXPIRED);
      }
      return { success: true, link: cached, fromCache: true };
    }

    const stored = await repository.findById(id);
    if (!stored) {
      return fail("NOT_FOUND", LINK_MESSAGES.NOT_FOUND);
    }

    // Removal is left to the expiry sweeper
    if (isExpired(stored, now())) {
      logger.warn({ id, source: "store" }, "Link expired");
      return fail("EXPIRED", LINK_MESSAGES.EXPIRED);
    }

    await bestEffort("set", id, () => cache.set(stored, defaultCacheTtlHours));

    return { success: true, link: stored, fromCache: false };
  }

  /**
   * Delete a link from the store, then from the cache
   */
  async function deleteLink(id: string): Promise<DeleteLinkResult> {
    if (!(await repository.exists(id))) {
      return fail("NOT_FOUND", LINK_MESSAGES.NOT_FOUND);
    }

    await repository.deleteById(id);
    await bestEffort("delete", id, () => cache.delete(id));

    logger.info({ id }, "Link deleted");
    return { success: true };
  }

  async function resolveRedirect(id: string): Promise<GetLinkResult> {
    const result = await getLink(id);
    if (result.success) {
      logger.info({ id, targetUrl: result.link.targetUrl, fromCache: result.fromCache }, "Redirecting");
    }
    return result;
  }

  return { createLink, getLink, deleteLink, resolveRedirect };
}
