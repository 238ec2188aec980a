/**
 * Redis Cache Abstraction
 *
 * Type-safe wrapper around Redis operations for link caching.
 *
 * Key Schema:
 *   url:{id} - Cached link record (JSON, dates as ISO strings)
 *
 * The cache is a read-through accelerator only. The store stays the
 * source of truth for existence; every entry carries its own TTL.
 */

import { z } from "zod";
import { CACHE_CONFIG, type CachedLinkRecord, type LinkRecord } from "@linkvault/shared";
import { createRedisClient, type RedisClientOptions } from "./client.js";
import type { CacheClient } from "./types.js";

const DEFAULT_TTL_SECONDS = CACHE_CONFIG.DEFAULT_TTL_HOURS * 3600;

/**
 * Redis client interface (minimal subset we need).
 * Allows easy mocking in tests.
 */
export interface RedisCommands {
  get(key: string): Promise<string | null>;
  setex(key: string, seconds: number, value: string): Promise<string>;
  del(key: string): Promise<number>;
  ping(): Promise<string>;
  quit(): Promise<string>;
}

// =========================================================================
// Generic Redis Cache
// =========================================================================

/**
 * Redis-based cache implementation
 */
export class RedisCache implements CacheClient {
  private client: RedisCommands;
  private defaultTTL: number;

  constructor(client: RedisCommands, defaultTTL = DEFAULT_TTL_SECONDS) {
    this.client = client;
    this.defaultTTL = defaultTTL;
  }

  async get(key: string): Promise<unknown> {
    const data = await this.client.get(key);
    if (data === null) return null;
    try {
      return JSON.parse(data);
    } catch {
      // Unparseable entry behaves like a miss
      return null;
    }
  }

  async set(key: string, value: unknown, ttl?: number): Promise<void> {
    const seconds = Math.max(1, Math.ceil(ttl ?? this.defaultTTL));
    await this.client.setex(key, seconds, JSON.stringify(value));
  }

  async del(key: string): Promise<void> {
    await this.client.del(key);
  }

  async ping(): Promise<boolean> {
    try {
      const result = await this.client.ping();
      return result === "PONG";
    } catch {
      return false;
    }
  }

  async disconnect(): Promise<void> {
    await this.client.quit();
  }
}

/**
 * Create a RedisCache instance from configuration
 */
export function createRedisCache(options: RedisClientOptions): RedisCache {
  const client = createRedisClient(options);
  return new RedisCache(client);
}

// =========================================================================
// Link Cache
// =========================================================================

const cachedLinkSchema = z.object({
  id: z.string().min(1),
  targetUrl: z.string().min(1),
  expiresAt: z.string().datetime({ offset: true }).nullable(),
  createdAt: z.string().datetime({ offset: true }),
  updatedAt: z.string().datetime({ offset: true }),
});

/**
 * Cache key for a link record
 */
export function linkCacheKey(id: string): string {
  return `${CACHE_CONFIG.LINK_KEY_PREFIX}${id}`;
}

export function toCachedLink(record: LinkRecord): CachedLinkRecord {
  return {
    id: record.id,
    targetUrl: record.targetUrl,
    expiresAt: record.expiresAt ? record.expiresAt.toISOString() : null,
    createdAt: record.createdAt.toISOString(),
    updatedAt: record.updatedAt.toISOString(),
  };
}

/**
 * Revive a cached payload. Returns null when the payload has the wrong shape.
 */
export function fromCachedLink(value: unknown): LinkRecord | null {
  const parsed = cachedLinkSchema.safeParse(value);
  if (!parsed.success) return null;

  const { id, targetUrl, expiresAt, createdAt, updatedAt } = parsed.data;
  return {
    id,
    targetUrl,
    expiresAt: expiresAt === null ? null : new Date(expiresAt),
    createdAt: new Date(createdAt),
    updatedAt: new Date(updatedAt),
  };
}

/**
 * Link-specific operations on top of a CacheClient.
 * All keys follow `url:{id}`.
 */
export class LinkCache {
  constructor(private readonly client: CacheClient) {}

  /**
   * Get a cached link record by ID
   */
  async get(id: string): Promise<LinkRecord | null> {
    const value = await this.client.get(linkCacheKey(id));
    if (value === null) return null;
    return fromCachedLink(value);
  }

  /**
   * Cache a link record for `ttlHours` hours
   */
  async set(record: LinkRecord, ttlHours: number): Promise<void> {
    await this.client.set(linkCacheKey(record.id), toCachedLink(record), ttlHours * 3600);
  }

  /**
   * Delete a cached link (no-op when absent)
   */
  async delete(id: string): Promise<void> {
    await this.client.del(linkCacheKey(id));
  }

  async ping(): Promise<boolean> {
    return this.client.ping();
  }
}
