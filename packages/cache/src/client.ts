/**
 * ioredis client for the link cache
 *
 * Commands fail fast: no offline queue, a short per-command timeout and a
 * bounded reconnect schedule. Callers treat a failed read as a miss.
 */

import Redis from "ioredis";
import { createLogger } from "@linkvault/logger";

const log = createLogger("redis");

export const REDIS_DEFAULTS = {
  CONNECT_TIMEOUT_MS: 5000,
  COMMAND_TIMEOUT_MS: 500,
  MAX_RETRIES_PER_REQUEST: 1,
  MAX_RECONNECT_ATTEMPTS: 10,
  RECONNECT_BASE_DELAY_MS: 100,
  RECONNECT_MAX_DELAY_MS: 2000,
} as const;

export interface RedisClientOptions {
  url: string;
  connectTimeoutMs?: number;
  /** Per-command deadline; REDIS_TIMEOUT_MS in the API config */
  commandTimeoutMs?: number;
  maxRetriesPerRequest?: number;
  /** Reconnect attempts before ioredis gives up on the connection */
  maxReconnectAttempts?: number;
}

/**
 * Delay before reconnect attempt `attempt` (1-based), or null to stop.
 * Linear backoff capped at RECONNECT_MAX_DELAY_MS.
 */
export function reconnectDelay(
  attempt: number,
  maxAttempts: number = REDIS_DEFAULTS.MAX_RECONNECT_ATTEMPTS
): number | null {
  if (attempt > maxAttempts) return null;
  return Math.min(attempt * REDIS_DEFAULTS.RECONNECT_BASE_DELAY_MS, REDIS_DEFAULTS.RECONNECT_MAX_DELAY_MS);
}

export function createRedisClient(options: RedisClientOptions): Redis {
  const {
    url,
    connectTimeoutMs = REDIS_DEFAULTS.CONNECT_TIMEOUT_MS,
    commandTimeoutMs = REDIS_DEFAULTS.COMMAND_TIMEOUT_MS,
    maxRetriesPerRequest = REDIS_DEFAULTS.MAX_RETRIES_PER_REQUEST,
    maxReconnectAttempts = REDIS_DEFAULTS.MAX_RECONNECT_ATTEMPTS,
  } = options;

  const client = new Redis(url, {
    connectTimeout: connectTimeoutMs,
    commandTimeout: commandTimeoutMs,
    maxRetriesPerRequest,
    enableReadyCheck: true,
    enableOfflineQueue: false,
    retryStrategy: (times) => {
      const delay = reconnectDelay(times, maxReconnectAttempts);
      if (delay === null) {
        log.error({ attempts: times }, "Giving up on Redis reconnects");
      }
      return delay;
    },
  });

  client.on("ready", () => log.info({ commandTimeoutMs }, "Redis ready"));
  client.on("reconnecting", (delay: number) => log.warn({ delay }, "Reconnecting to Redis"));
  client.on("error", (err: Error) => log.error({ err }, "Redis error"));
  client.on("end", () => log.debug("Redis connection ended"));

  return client;
}
