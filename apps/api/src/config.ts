/**
 * Configuration Module
 *
 * Loads configuration from environment variables.
 * Simple parsing with defaults; fails fast on startup if required vars are missing.
 */

import { SWEEP_CONFIG, CACHE_CONFIG, isHttpUrl } from "@linkvault/shared";
import type { LogLevel } from "@linkvault/logger";

export interface Config {
  // Server
  port: number;
  host: string;
  /** Public origin used to compose short URLs */
  baseUrl: string;
  /** Allowed CORS origin; any origin when unset */
  corsOrigin?: string;

  // Database
  databaseUrl: string;
  dbTimeoutMs: number;

  // Redis (cache + job queue)
  redisUrl: string;
  redisTimeoutMs: number;

  // Cache
  defaultCacheTtlHours: number;

  // Expiry sweeper
  enableSweeper: boolean;
  sweepCron: string;

  // Logging
  logLevel: LogLevel;
  nodeEnv: string;
}

type Env = Record<string, string | undefined>;

// =============================================================================
// Environment Parsing Helpers
// =============================================================================

/**
 * Get required environment variable or throw.
 */
function required(env: Env, name: string): string {
  const value = env[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

/**
 * Get optional environment variable with default.
 */
function optional(env: Env, name: string, defaultValue: string): string {
  return env[name] || defaultValue;
}

/**
 * Parse integer with default.
 */
function optionalInt(env: Env, name: string, defaultValue: number): number {
  const value = env[name];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];

/**
 * Parse log level string, falling back to "info".
 */
function parseLogLevel(level: string): LogLevel {
  const normalized = level.toLowerCase();
  return LOG_LEVELS.find((candidate) => candidate === normalized) ?? "info";
}

// =============================================================================
// Configuration Loading
// =============================================================================

/**
 * Load configuration from environment.
 * Call once at startup.
 *
 * @throws Error if required variables are missing
 */
export function loadConfig(env: Env = process.env): Config {
  const port = optionalInt(env, "PORT", 8080);

  return {
    port,
    host: optional(env, "HOST", "0.0.0.0"),
    baseUrl: optional(env, "BASE_URL", `http://localhost:${port}`),
    corsOrigin: env.CORS_ORIGIN || undefined,

    databaseUrl: required(env, "DATABASE_URL"),
    dbTimeoutMs: optionalInt(env, "DB_TIMEOUT_MS", 2000),

    redisUrl: required(env, "REDIS_URL"),
    redisTimeoutMs: optionalInt(env, "REDIS_TIMEOUT_MS", 500),

    defaultCacheTtlHours: optionalInt(env, "DEFAULT_CACHE_TTL_HOURS", CACHE_CONFIG.DEFAULT_TTL_HOURS),

    enableSweeper: env.ENABLE_SWEEPER !== "false",
    sweepCron: optional(env, "SWEEP_CRON", SWEEP_CONFIG.CRON_PATTERN),

    logLevel: parseLogLevel(optional(env, "LOG_LEVEL", "info")),
    nodeEnv: optional(env, "NODE_ENV", "development"),
  };
}

/**
 * Check configuration for suboptimal settings.
 *
 * @returns Warning messages; empty when the configuration looks sane
 */
export function validateConfig(config: Config): string[] {
  const warnings: string[] = [];

  if (!isHttpUrl(config.baseUrl)) {
    warnings.push(`BASE_URL=${config.baseUrl} is not an http(s) URL. Short URLs will be malformed.`);
  }

  if (config.defaultCacheTtlHours < 1) {
    warnings.push(
      `DEFAULT_CACHE_TTL_HOURS=${config.defaultCacheTtlHours} is below 1. Entries will be written with a 1 second TTL.`
    );
  }

  if (config.defaultCacheTtlHours > 168) {
    warnings.push(
      `DEFAULT_CACHE_TTL_HOURS=${config.defaultCacheTtlHours} is over a week. Entries left behind by a failed invalidation will linger.`
    );
  }

  if (config.redisTimeoutMs > 1000) {
    warnings.push(`REDIS_TIMEOUT_MS=${config.redisTimeoutMs}ms is high. Cache misses will be slow to fall back.`);
  }

  if (config.dbTimeoutMs > 5000) {
    warnings.push(`DB_TIMEOUT_MS=${config.dbTimeoutMs}ms is high. Requests may hang on a degraded database.`);
  }

  return warnings;
}
