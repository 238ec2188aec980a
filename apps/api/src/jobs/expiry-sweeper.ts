/**
 * Expiry Sweeper
 *
 * Hourly job that evicts expired links from the store and the cache.
 *
 * Scheduling:
 * - A BullMQ repeatable job on SWEEP_CONFIG.CRON_PATTERN (UTC)
 * - The repeat key dedupes the schedule when several API instances start
 * - Worker concurrency is 1
 *
 * A record that fails to delete is counted and left in place; the next run
 * picks it up again. Cache eviction is best-effort.
 */

import { Queue, Worker, type Job } from "bullmq";
import type { LinkCache } from "@linkvault/cache";
import type { LinkRepository } from "@linkvault/db";
import { createLogger, type Logger } from "@linkvault/logger";
import { SWEEP_CONFIG } from "@linkvault/shared";

// =============================================================================
// Types
// =============================================================================

export interface SweepDeps {
  repository: LinkRepository;
  cache: LinkCache;
  now?: () => Date;
  logger?: Logger;
}

export interface SweepResult {
  scanned: number;
  deleted: number;
  failed: number;
  durationMs: number;
}

export interface SweepJobData {
  triggeredAt: string;
}

export interface SweeperOptions {
  redisUrl: string;
  /** Cron pattern, defaults to hourly at minute 0 */
  pattern?: string;
}

const sweepLogger = createLogger("sweeper");

// =============================================================================
// Sweep
// =============================================================================

/**
 * Delete every record whose expiry is at or before now
 */
export async function sweepExpiredLinks(deps: SweepDeps): Promise<SweepResult> {
  const { repository, cache, now = () => new Date(), logger = sweepLogger } = deps;
  const startedAt = Date.now();

  const expired = await repository.findAllWithExpiryBefore(now());

  let deleted = 0;
  let failed = 0;

  for (const record of expired) {
    try {
      await repository.delete(record);
    } catch (err) {
      failed++;
      logger.error({ err, id: record.id }, "Failed to evict expired link");
      continue;
    }

    // Counted once the row is gone; cache eviction is best-effort
    deleted++;
    try {
      await cache.delete(record.id);
    } catch (err) {
      logger.warn({ err, id: record.id }, "Cache eviction failed for expired link");
    }
  }

  const result: SweepResult = {
    scanned: expired.length,
    deleted,
    failed,
    durationMs: Date.now() - startedAt,
  };

  logger.info(result, "Expiry sweep finished");
  return result;
}

// =============================================================================
// Worker Management
// =============================================================================

let sweepQueue: Queue<SweepJobData> | null = null;
let sweepWorker: Worker<SweepJobData, SweepResult> | null = null;

function connectionFor(redisUrl: string) {
  return {
    url: redisUrl,
    maxRetriesPerRequest: null,
    enableReadyCheck: false,
  };
}

/**
 * Register the repeatable sweep job and start its worker
 */
export async function startExpirySweeper(
  deps: SweepDeps,
  options: SweeperOptions
): Promise<Worker<SweepJobData, SweepResult>> {
  if (sweepWorker) {
    return sweepWorker;
  }

  const pattern = options.pattern ?? SWEEP_CONFIG.CRON_PATTERN;

  sweepQueue = new Queue<SweepJobData>(SWEEP_CONFIG.QUEUE_NAME, {
    connection: connectionFor(options.redisUrl),
    defaultJobOptions: {
      removeOnComplete: { count: 24 },
      removeOnFail: { age: 604800 }, // 7 days
    },
  });

  sweepQueue.on("error", (err: Error) => {
    sweepLogger.error({ err }, "Sweep queue error");
  });

  await sweepQueue.add(
    SWEEP_CONFIG.JOB_NAME,
    { triggeredAt: new Date().toISOString() },
    { repeat: { pattern, tz: "UTC" } }
  );

  sweepWorker = new Worker<SweepJobData, SweepResult>(
    SWEEP_CONFIG.QUEUE_NAME,
    async () => sweepExpiredLinks(deps),
    {
      connection: connectionFor(options.redisUrl),
      concurrency: 1,
    }
  );

  sweepWorker.on("error", (err: Error) => {
    sweepLogger.error({ err }, "Sweep worker error");
  });

  sweepWorker.on("completed", (job: Job<SweepJobData, SweepResult>, result: SweepResult) => {
    sweepLogger.debug({ jobId: job.id, deleted: result.deleted }, "Sweep job completed");
  });

  sweepWorker.on("failed", (job: Job<SweepJobData, SweepResult> | undefined, error: Error) => {
    sweepLogger.error({ jobId: job?.id, err: error }, "Sweep job failed");
  });

  sweepLogger.info({ pattern, queue: SWEEP_CONFIG.QUEUE_NAME }, "Expiry sweeper started");
  return sweepWorker;
}

/**
 * Stop the worker and close the queue
 */
export async function stopExpirySweeper(): Promise<void> {
  if (sweepWorker) {
    await sweepWorker.close();
    sweepWorker = null;
    sweepLogger.info("Expiry sweeper stopped");
  }

  if (sweepQueue) {
    await sweepQueue.close();
    sweepQueue = null;
  }
}
