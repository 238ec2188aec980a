/**
 * Cache Type Definitions
 */

/**
 * Generic key-value cache with per-entry expiry.
 *
 * Values are JSON-serialized on write. `get` returns the parsed JSON as
 * `unknown`; callers validate the shape they expect.
 * Connectivity errors are thrown, not swallowed.
 */
export interface CacheClient {
  get(key: string): Promise<unknown>;
  set(key: string, value: unknown, ttlSeconds?: number): Promise<void>;
  del(key: string): Promise<void>;
  ping(): Promise<boolean>;
  disconnect(): Promise<void>;
}
