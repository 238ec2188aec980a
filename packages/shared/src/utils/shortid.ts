/**
 * Short ID Module
 *
 * Generation and validation of short link identifiers.
 *
 * Strategy: Random Base62
 * - Length: 6 characters
 * - Alphabet: a-zA-Z0-9 (62 URL-safe characters)
 * - At least one letter and one digit, so every generated ID passes
 *   the same rules applied to custom IDs
 * - Collision handling: none here, the link service checks the store
 */

import { randomInt } from "node:crypto";
import { SHORT_ID_CONFIG } from "../constants/index.js";

// =============================================================================
// TYPES
// =============================================================================

/**
 * Source of uniform random integers in [0, max).
 * Defaults to `crypto.randomInt`; tests may inject a seeded source.
 */
export type RandomIntSource = (max: number) => number;

/**
 * Name of a validation rule, in evaluation order.
 */
export type ShortIdRule = "minLength" | "letter" | "digit" | "whitespace" | "maxLength";

/**
 * Result of a validation operation
 */
export type ValidationResult =
  | { valid: true }
  | { valid: false; rule: ShortIdRule; error: string };

const secureRandomInt: RandomIntSource = (max) => randomInt(max);

// =============================================================================
// SECTION 1: GENERATION
// =============================================================================

/**
 * Generate a random short ID.
 *
 * Seeds one letter and one digit, fills the rest from the full alphabet,
 * then Fisher–Yates shuffles the result so the seeded characters land
 * at unpredictable positions.
 *
 * @example
 * ```ts
 * generateShortId(); // "q7XbT2"
 * ```
 */
export function generateShortId(random: RandomIntSource = secureRandomInt): string {
  const { LENGTH, LETTERS, DIGITS, ALPHABET } = SHORT_ID_CONFIG;

  const chars: string[] = [
    LETTERS.charAt(random(LETTERS.length)),
    DIGITS.charAt(random(DIGITS.length)),
  ];

  while (chars.length < LENGTH) {
    chars.push(ALPHABET.charAt(random(ALPHABET.length)));
  }

  return shuffle(chars, random).join("");
}

/**
 * In-place Fisher–Yates shuffle.
 */
function shuffle<T>(items: T[], random: RandomIntSource): T[] {
  for (let i = items.length - 1; i > 0; i--) {
    const j = random(i + 1);
    const tmp = items[i];
    items[i] = items[j];
    items[j] = tmp;
  }
  return items;
}

// =============================================================================
// SECTION 2: VALIDATION
// =============================================================================

const LETTER_PATTERN = /[a-zA-Z]/;
const DIGIT_PATTERN = /[0-9]/;
const WHITESPACE_PATTERN = /\s/;

/**
 * Validate a short ID.
 *
 * Rules are checked in order and the first failure is reported:
 * 1. at least MIN_LENGTH characters
 * 2. at least one letter
 * 3. at least one digit
 * 4. no whitespace
 * 5. at most MAX_LENGTH characters
 *
 * A missing or empty ID is "not provided" and passes.
 *
 * @example
 * ```ts
 * validateShortId("abc123"); // { valid: true }
 * validateShortId("abc1");   // { valid: false, rule: "minLength", ... }
 * ```
 */
export function validateShortId(id: string | null | undefined): ValidationResult {
  if (isBlank(id)) {
    return { valid: true };
  }

  const { MIN_LENGTH, MAX_LENGTH } = SHORT_ID_CONFIG;

  if (id.length < MIN_LENGTH) {
    return {
      valid: false,
      rule: "minLength",
      error: `Short ID must be at least ${MIN_LENGTH} characters long`,
    };
  }

  if (!LETTER_PATTERN.test(id)) {
    return {
      valid: false,
      rule: "letter",
      error: "Short ID must contain at least one letter",
    };
  }

  if (!DIGIT_PATTERN.test(id)) {
    return {
      valid: false,
      rule: "digit",
      error: "Short ID must contain at least one digit",
    };
  }

  if (WHITESPACE_PATTERN.test(id)) {
    return {
      valid: false,
      rule: "whitespace",
      error: "Short ID must not contain whitespace",
    };
  }

  if (id.length > MAX_LENGTH) {
    return {
      valid: false,
      rule: "maxLength",
      error: `Short ID must be at most ${MAX_LENGTH} characters long`,
    };
  }

  return { valid: true };
}

/**
 * True when an optional ID was not supplied.
 */
export function isBlank(id: string | null | undefined): id is "" | null | undefined {
  return id === undefined || id === null || id === "";
}
