/**
 * Short ID Configuration Constants
 *
 * Single source of truth for identifier generation and validation.
 */
export const SHORT_ID_CONFIG = {
  /**
   * Length of generated IDs.
   * 6 chars = 62^6 = ~56.8 billion combinations.
   */
  LENGTH: 6,

  /** Minimum length accepted for custom IDs */
  MIN_LENGTH: 6,

  /** Maximum length accepted for custom IDs (column width) */
  MAX_LENGTH: 64,

  LETTERS: "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ",

  DIGITS: "0123456789",

  /** Base62 alphabet: letters followed by digits */
  ALPHABET: "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789",
} as const;

/**
 * Cache Configuration Constants
 */
export const CACHE_CONFIG = {
  /** Key prefix for cached link records: url:{id} */
  LINK_KEY_PREFIX: "url:",

  /** Cache TTL for links without an explicit TTL */
  DEFAULT_TTL_HOURS: 24,
} as const;

/**
 * Expiry sweep schedule: every hour at minute 0.
 */
export const SWEEP_CONFIG = {
  QUEUE_NAME: "link-expiry-sweep",
  JOB_NAME: "sweep-expired-links",
  CRON_PATTERN: "0 * * * *",
} as const;

/**
 * Link lifetime bounds, in whole hours.
 * The upper bound (2^31 - 1) keeps `now + ttl` inside the range of a Date.
 */
export const TTL_CONFIG = {
  MIN_HOURS: 1,
  MAX_HOURS: 2_147_483_647,
} as const;
