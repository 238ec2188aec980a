/**
 * @linkvault/shared - Shared Package Exports
 *
 * Central export point for shared types, utilities, and constants.
 *
 * ```ts
 * import { generateShortId, validateShortId } from "@linkvault/shared";
 * ```
 */

// Types (LinkRecord, CachedLinkRecord, LinkResult, ApiResponse)
export * from "./types/index.js";

// Utilities (short ID generation and validation, URL helpers)
export * from "./utils/index.js";

// Constants (SHORT_ID_CONFIG, CACHE_CONFIG, TTL_CONFIG, SWEEP_CONFIG)
export * from "./constants/index.js";
