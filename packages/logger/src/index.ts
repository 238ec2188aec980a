/**
 * @linkvault/logger - Structured Logging Package
 *
 * Provides consistent structured logging across all LinkVault services.
 * Uses pino for high-performance JSON logging.
 *
 * Usage:
 * ```ts
 * import { logger, createLogger } from "@linkvault/logger";
 *
 * // Use default logger
 * logger.info({ id: "abc123" }, "Link created");
 *
 * // Create component-specific logger
 * const sweepLogger = createLogger("sweeper");
 * sweepLogger.error({ err }, "Sweep failed");
 * ```
 */

import pino from "pino";

// ============================================================================
// Configuration
// ============================================================================

const LOG_LEVEL = process.env.LOG_LEVEL || "info";
const NODE_ENV = process.env.NODE_ENV || "development";
const SERVICE_NAME = process.env.SERVICE_NAME || "linkvault";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/**
 * Base pino options shared by standalone loggers and the Fastify request logger.
 */
export function buildLoggerOptions(name: string, level: string = LOG_LEVEL): pino.LoggerOptions {
  return {
    name: `${SERVICE_NAME}:${name}`,
    level: NODE_ENV === "test" ? "silent" : level,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    transport:
      NODE_ENV === "development"
        ? {
            target: "pino-pretty",
            options: {
              colorize: true,
              translateTime: "SYS:standard",
              ignore: "pid,hostname",
            },
          }
        : undefined,
    base: {
      service: name,
      env: NODE_ENV,
    },
  };
}

// ============================================================================
// Logger Factory
// ============================================================================

/**
 * Create a logger instance for a specific service/component
 */
export function createLogger(name: string, level?: LogLevel): pino.Logger {
  return pino(buildLoggerOptions(name, level));
}

/**
 * Default logger for general use
 */
export const logger = createLogger("main");

/**
 * Check if a log level is enabled
 */
export function isLevelEnabled(level: LogLevel): boolean {
  return logger.isLevelEnabled(level);
}

// Re-export pino types for consumers
export type { Logger } from "pino";
