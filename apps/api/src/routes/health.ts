/**
 * Health Check Routes
 *
 * Liveness and readiness probes for load balancers and orchestrators.
 */

import type { FastifyInstance } from "fastify";

export type HealthCheck = () => Promise<boolean>;

export interface HealthRoutesOptions {
  /** Named dependency checks for the readiness probe */
  checks: Record<string, HealthCheck>;
}

export async function healthRoutes(fastify: FastifyInstance, options: HealthRoutesOptions): Promise<void> {
  // Liveness probe - basic server health
  fastify.get("/health", async () => {
    return { status: "ok", timestamp: new Date().toISOString() };
  });

  // Readiness probe - checks dependencies
  fastify.get("/health/ready", async (request, reply) => {
    const checks: Record<string, "ok" | "error"> = {};

    await Promise.all(
      Object.entries(options.checks).map(async ([name, check]) => {
        try {
          checks[name] = (await check()) ? "ok" : "error";
        } catch (err) {
          request.log.warn({ err, check: name }, "Readiness check failed");
          checks[name] = "error";
        }
      })
    );

    const allHealthy = Object.values(checks).every((v) => v === "ok");

    return reply.status(allHealthy ? 200 : 503).send({
      status: allHealthy ? "ok" : "degraded",
      checks,
      timestamp: new Date().toISOString(),
    });
  });
}
