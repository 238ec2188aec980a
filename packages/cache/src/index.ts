/**
 * Cache Package Exports
 *
 * Provides a unified interface for caching operations.
 * Uses Redis for distributed caching across API instances.
 */

export {
  RedisCache,
  LinkCache,
  createRedisCache,
  linkCacheKey,
  toCachedLink,
  fromCachedLink,
  type RedisCommands,
} from "./cache.js";
export { MemoryCache } from "./memory.js";
export { createRedisClient, reconnectDelay, REDIS_DEFAULTS, type RedisClientOptions } from "./client.js";
export type { CacheClient } from "./types.js";
