/**
 * Shared Domain Types
 */

// =============================================================================
// Link Record
// =============================================================================

/**
 * The persisted mapping from short ID to target URL.
 *
 * `createdAt`/`updatedAt` are assigned by the store; business logic only
 * ever reads them.
 */
export interface LinkRecord {
  /** Short identifier (primary key) */
  id: string;
  /** Original long URL */
  targetUrl: string;
  /** Expiration instant, or null for links that never expire */
  expiresAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Fields supplied by the service when inserting a new record.
 */
export type NewLinkRecord = Pick<LinkRecord, "id" | "targetUrl" | "expiresAt">;

/**
 * JSON shape of a LinkRecord inside the cache.
 * Dates are ISO-8601 strings.
 */
export interface CachedLinkRecord {
  id: string;
  targetUrl: string;
  expiresAt: string | null;
  createdAt: string;
  updatedAt: string;
}

// =============================================================================
// Errors
// =============================================================================

/**
 * Domain error codes returned by link operations.
 */
export type LinkErrorCode = "BAD_REQUEST" | "CONFLICT" | "NOT_FOUND" | "EXPIRED";

/**
 * HTTP status for each domain error code.
 */
export const LINK_ERROR_STATUS: Record<LinkErrorCode, number> = {
  BAD_REQUEST: 400,
  CONFLICT: 409,
  NOT_FOUND: 404,
  EXPIRED: 410,
};

export interface LinkFailure {
  success: false;
  errorCode: LinkErrorCode;
  error: string;
}

/**
 * Outcome of a link operation: payload on success, coded failure otherwise.
 */
export type LinkResult<T extends object = object> = ({ success: true } & T) | LinkFailure;

// =============================================================================
// API Envelope
// =============================================================================

/**
 * Standard response body for every JSON route.
 * `data` is omitted when there is nothing to return.
 */
export interface ApiResponse<T = undefined> {
  message: string;
  statusCode: number;
  data?: T;
}

/**
 * Public view of a short link returned by the create route.
 */
export interface ShortenUrlResponse {
  id: string;
  url: string;
  /** Expiration as ISO string, omitted when the link never expires */
  ttl?: string;
  shortenUrl: string;
}
