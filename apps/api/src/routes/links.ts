/**
 * Link Routes
 *
 * Endpoints (prefix /api/v1/url-shortener):
 *   GET    /            - Welcome message
 *   POST   /?ttl=hours  - Create a new short link
 *   GET    /:id         - Redirect to target URL
 *   GET    /:id/info    - Link details
 *   DELETE /:id         - Delete a short link
 *
 * Plus the public redirect at GET /:id, registered without prefix.
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import {
  LINK_ERROR_STATUS,
  type ApiResponse,
  type LinkFailure,
  type LinkRecord,
  type ShortenUrlResponse,
} from "@linkvault/shared";
import type { LinkService } from "../services/link-service.js";
import {
  createLinkBodySchema,
  createLinkQuerySchema,
  linkParamsSchema,
  toFieldErrors,
  type LinkParams,
} from "./schemas.js";

export const API_PREFIX = "/api/v1/url-shortener";
export const WELCOME_MESSAGE = "Welcome to URL - Shortener Service!";

export interface LinkRoutesOptions {
  service: LinkService;
}

export interface LinkInfoResponse {
  id: string;
  url: string;
  ttl?: string;
  createdAt: string;
}

// ============================================================================
// Reply Helpers
// ============================================================================

function sendFailure(reply: FastifyReply, failure: LinkFailure): FastifyReply {
  const statusCode = LINK_ERROR_STATUS[failure.errorCode];
  const body: ApiResponse = { message: failure.error, statusCode };
  return reply.status(statusCode).send(body);
}

function sendValidationError(reply: FastifyReply, fields: Record<string, string>): FastifyReply {
  const body: ApiResponse<Record<string, string>> = {
    message: "Validation failed",
    statusCode: 400,
    data: fields,
  };
  return reply.status(400).send(body);
}

function toShortenUrlResponse(link: LinkRecord, shortenUrl: string): ShortenUrlResponse {
  return {
    id: link.id,
    url: link.targetUrl,
    ...(link.expiresAt ? { ttl: link.expiresAt.toISOString() } : {}),
    shortenUrl,
  };
}

// ============================================================================
// Route Handlers
// ============================================================================

function createRedirectHandler(service: LinkService) {
  return async function redirectHandler(
    request: FastifyRequest<{ Params: LinkParams }>,
    reply: FastifyReply
  ): Promise<FastifyReply> {
    const params = linkParamsSchema.safeParse(request.params);
    if (!params.success) {
      return sendValidationError(reply, toFieldErrors(params.error));
    }

    const result = await service.resolveRedirect(params.data.id);
    if (!result.success) {
      return sendFailure(reply, result);
    }

    return reply.code(302).header("location", result.link.targetUrl).send();
  };
}

// ============================================================================
// Route Registration
// ============================================================================

/**
 * Link management routes; register with `{ prefix: API_PREFIX }`
 */
export async function linkRoutes(fastify: FastifyInstance, options: LinkRoutesOptions): Promise<void> {
  const { service } = options;

  fastify.get("/", async (_request, reply) => {
    return reply.type("text/plain; charset=utf-8").send(WELCOME_MESSAGE);
  });

  // POST /?ttl=hours - Create a new short link
  fastify.post<{ Body: unknown; Querystring: unknown }>("/", async (request, reply) => {
    const body = createLinkBodySchema.safeParse(request.body);
    const query = createLinkQuerySchema.safeParse(request.query);

    if (!body.success || !query.success) {
      return sendValidationError(reply, {
        ...(query.success ? {} : toFieldErrors(query.error)),
        ...(body.success ? {} : toFieldErrors(body.error)),
      });
    }

    const result = await service.createLink({
      targetUrl: body.data.longUrl,
      customId: body.data.customId,
      ttlHours: query.data.ttl,
    });

    if (!result.success) {
      return sendFailure(reply, result);
    }

    const response: ApiResponse<ShortenUrlResponse> = {
      message: "Short URL created successfully",
      statusCode: 201,
      data: toShortenUrlResponse(result.link, result.publicUrl),
    };
    return reply.status(201).send(response);
  });

  // GET /:id - Redirect to target URL
  fastify.get<{ Params: LinkParams }>("/:id", createRedirectHandler(service));

  // GET /:id/info - Link details without redirecting
  fastify.get<{ Params: LinkParams }>("/:id/info", async (request, reply) => {
    const params = linkParamsSchema.safeParse(request.params);
    if (!params.success) {
      return sendValidationError(reply, toFieldErrors(params.error));
    }

    const result = await service.getLink(params.data.id);
    if (!result.success) {
      return sendFailure(reply, result);
    }

    const { link } = result;
    const response: ApiResponse<LinkInfoResponse> = {
      message: "Short URL found",
      statusCode: 200,
      data: {
        id: link.id,
        url: link.targetUrl,
        ...(link.expiresAt ? { ttl: link.expiresAt.toISOString() } : {}),
        createdAt: link.createdAt.toISOString(),
      },
    };
    return reply.status(200).send(response);
  });

  // DELETE /:id - Delete a short link
  fastify.delete<{ Params: LinkParams }>("/:id", async (request, reply) => {
    const params = linkParamsSchema.safeParse(request.params);
    if (!params.success) {
      return sendValidationError(reply, toFieldErrors(params.error));
    }

    const result = await service.deleteLink(params.data.id);
    if (!result.success) {
      return sendFailure(reply, result);
    }

    const response: ApiResponse = { message: "Shorten url deleted successfully", statusCode: 200 };
    return reply.status(200).send(response);
  });
}

/**
 * Public redirect at the root: GET /:id
 */
export async function redirectRoutes(fastify: FastifyInstance, options: LinkRoutesOptions): Promise<void> {
  fastify.get<{ Params: LinkParams }>("/:id", createRedirectHandler(options.service));
}
