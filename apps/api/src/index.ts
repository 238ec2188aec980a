/**
 * LinkVault API Service
 *
 * Entry point: wires config, store, cache, Link Service, HTTP routes and the
 * hourly expiry sweeper.
 *
 * Endpoints:
 *   POST   /api/v1/url-shortener?ttl=hours - Create new short link
 *   GET    /api/v1/url-shortener/:id       - Redirect to target URL
 *   GET    /api/v1/url-shortener/:id/info  - Link details
 *   DELETE /api/v1/url-shortener/:id       - Delete short link
 *   GET    /:id                            - Redirect to target URL
 *   GET    /health, /health/ready          - Health checks
 */

import { createRedisCache, LinkCache } from "@linkvault/cache";
import { createPool, disconnectDb, ensureSchema, PgLinkRepository } from "@linkvault/db";
import { logger } from "@linkvault/logger";
import type { FastifyInstance } from "fastify";

import { loadConfig, validateConfig } from "./config.js";
import { buildApp } from "./app.js";
import { createLinkService } from "./services/link-service.js";
import { startExpirySweeper, stopExpirySweeper } from "./jobs/expiry-sweeper.js";

const config = loadConfig();

for (const warning of validateConfig(config)) {
  logger.warn(warning);
}

// ============================================================================
// Infrastructure
// ============================================================================

const pool = createPool({
  connectionString: config.databaseUrl,
  queryTimeoutMs: config.dbTimeoutMs,
});

const redisCache = createRedisCache({
  url: config.redisUrl,
  commandTimeoutMs: config.redisTimeoutMs,
});

const repository = new PgLinkRepository(pool);
const linkCache = new LinkCache(redisCache);

const service = createLinkService({
  repository,
  cache: linkCache,
  baseUrl: config.baseUrl,
  defaultCacheTtlHours: config.defaultCacheTtlHours,
});

let app: FastifyInstance | null = null;

// ============================================================================
// Graceful Shutdown
// ============================================================================

async function gracefulShutdown(signal: string): Promise<void> {
  logger.info({ signal }, "Received shutdown signal");

  try {
    if (app) {
      await app.close();
      logger.info("Fastify server closed");
    }

    await stopExpirySweeper();

    await redisCache.disconnect();
    logger.info("Redis connection closed");

    await disconnectDb(pool);
    logger.info("Database connection closed");

    process.exit(0);
  } catch (err) {
    logger.error({ err }, "Error during shutdown");
    process.exit(1);
  }
}

process.on("SIGINT", () => void gracefulShutdown("SIGINT"));
process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));

// ============================================================================
// Server Start
// ============================================================================

async function start(): Promise<void> {
  await ensureSchema(pool);
  logger.info("Database connection verified");

  app = await buildApp(
    {
      service,
      checks: {
        database: () => repository.ping(),
        cache: () => linkCache.ping(),
      },
    },
    {
      logLevel: config.logLevel,
      isProduction: config.nodeEnv === "production",
      corsOrigin: config.corsOrigin,
    }
  );

  await app.listen({ port: config.port, host: config.host });
  logger.info(`LinkVault API running on http://${config.host}:${config.port}`);

  if (config.enableSweeper) {
    await startExpirySweeper(
      { repository, cache: linkCache },
      { redisUrl: config.redisUrl, pattern: config.sweepCron }
    );
  }
}

start().catch((err: unknown) => {
  logger.error({ err }, "Failed to start server");
  process.exit(1);
});
