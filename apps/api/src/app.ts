/**
 * Fastify application factory
 *
 * Builds the HTTP surface without binding a port, so tests can drive it
 * through `app.inject()`.
 */

import Fastify, { type FastifyError, type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import { buildLoggerOptions, type LogLevel } from "@linkvault/logger";
import type { ApiResponse } from "@linkvault/shared";

import type { LinkService } from "./services/link-service.js";
import { API_PREFIX, linkRoutes, redirectRoutes } from "./routes/links.js";
import { healthRoutes, type HealthCheck } from "./routes/health.js";

export interface AppDeps {
  service: LinkService;
  checks: Record<string, HealthCheck>;
}

export interface AppOptions {
  logLevel?: LogLevel;
  isProduction?: boolean;
  corsOrigin?: string;
}

export async function buildApp(deps: AppDeps, options: AppOptions = {}): Promise<FastifyInstance> {
  const { logLevel = "info", isProduction = false, corsOrigin } = options;

  const fastify = Fastify({
    logger: buildLoggerOptions("http", logLevel),
    trustProxy: true,
    requestIdHeader: "x-request-id",
  });

  // ==========================================================================
  // Error Handling
  // ==========================================================================

  // Set before any register() so every plugin context inherits it
  fastify.setErrorHandler((error: FastifyError, request, reply) => {
    const statusCode = error.statusCode ?? 500;

    // Malformed JSON, oversized bodies and similar client errors
    if (statusCode < 500) {
      request.log.warn({ err: error }, "Client error");
      const body: ApiResponse = { message: error.message, statusCode };
      return reply.status(statusCode).send(body);
    }

    request.log.error({ err: error }, "Request error");
    const body: ApiResponse = {
      message: isProduction
        ? "An unexpected error occurred"
        : `An unexpected error occurred: ${error.message}`,
      statusCode: 500,
    };
    return reply.status(500).send(body);
  });

  // ==========================================================================
  // Plugins
  // ==========================================================================

  await fastify.register(helmet, {
    contentSecurityPolicy: isProduction,
  });

  await fastify.register(cors, {
    origin: corsOrigin ?? true,
  });

  // ==========================================================================
  // Routes
  // ==========================================================================

  await fastify.register(healthRoutes, { checks: deps.checks });
  await fastify.register(linkRoutes, { prefix: API_PREFIX, service: deps.service });
  await fastify.register(redirectRoutes, { service: deps.service });

  return fastify;
}
