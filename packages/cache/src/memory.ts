/**
 * In-Process Cache
 *
 * Map-backed CacheClient with per-entry expiry, used where no Redis is
 * available (tests, local tooling). Values are stored as JSON strings so
 * reads behave like Redis round-trips.
 */

import type { CacheClient } from "./types.js";

interface CacheEntry {
  value: string;
  expiresAt: number;
}

export class MemoryCache implements CacheClient {
  private store = new Map<string, CacheEntry>();

  constructor(
    private readonly defaultTTL = 3600,
    private readonly clock: () => number = Date.now
  ) {}

  async get(key: string): Promise<unknown> {
    const entry = this.store.get(key);
    if (!entry) return null;
    if (entry.expiresAt <= this.clock()) {
      this.store.delete(key);
      return null;
    }
    return JSON.parse(entry.value);
  }

  async set(key: string, value: unknown, ttl?: number): Promise<void> {
    const seconds = ttl ?? this.defaultTTL;
    this.store.set(key, {
      value: JSON.stringify(value),
      expiresAt: this.clock() + seconds * 1000,
    });
  }

  async del(key: string): Promise<void> {
    this.store.delete(key);
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async disconnect(): Promise<void> {
    this.store.clear();
  }

  /**
   * Remaining lifetime of a key in seconds, or null when absent
   */
  ttl(key: string): number | null {
    const entry = this.store.get(key);
    if (!entry) return null;
    return Math.max(0, Math.ceil((entry.expiresAt - this.clock()) / 1000));
  }

  keys(): string[] {
    return [...this.store.keys()];
  }
}
