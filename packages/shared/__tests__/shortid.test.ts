/**
 * Short ID Tests
 *
 * Tests for short ID generation and validation.
 * @see packages/shared/src/utils/shortid.ts
 */

import { describe, it, expect } from "@jest/globals";
import {
  generateShortId,
  validateShortId,
  isBlank,
  SHORT_ID_CONFIG,
  type RandomIntSource,
} from "../src/index.js";

/**
 * Deterministic source that replays a fixed sequence of values.
 */
function sequenceSource(values: number[]): RandomIntSource {
  let i = 0;
  return (max) => {
    const value = values[i++ % values.length];
    return value % max;
  };
}

describe("Short ID Generation", () => {
  describe("generateShortId", () => {
    it("should generate an ID of the configured length", () => {
      expect(generateShortId()).toHaveLength(SHORT_ID_CONFIG.LENGTH);
      expect(SHORT_ID_CONFIG.LENGTH).toBe(6);
    });

    it("should only contain alphanumeric characters with a letter and a digit", () => {
      for (let i = 0; i < 500; i++) {
        const id = generateShortId();
        expect(id).toMatch(/^[a-zA-Z0-9]{6}$/);
        expect(id).toMatch(/[a-zA-Z]/);
        expect(id).toMatch(/[0-9]/);
      }
    });

    it("should always pass validation", () => {
      for (let i = 0; i < 500; i++) {
        expect(validateShortId(generateShortId())).toEqual({ valid: true });
      }
    });

    it("should generate distinct IDs (statistical test)", () => {
      const ids = new Set<string>();
      const iterations = 1000;

      for (let i = 0; i < iterations; i++) {
        ids.add(generateShortId());
      }

      // 1000 draws from ~56.8 billion; a repeat is vanishingly unlikely
      expect(ids.size).toBeGreaterThan(iterations - 2);
    });

    it("should differ between successive calls across repeated trials", () => {
      let equalPairs = 0;
      for (let i = 0; i < 100; i++) {
        if (generateShortId() === generateShortId()) equalPairs++;
      }
      expect(equalPairs).toBe(0);
    });

    it("should seed a letter and a digit before shuffling", () => {
      // All zeros: letter 'a', digit '0', fill 'a' x4, shuffle swaps with index 0
      const id = generateShortId(() => 0);
      expect(id).toHaveLength(6);
      expect(id.split("").sort().join("")).toBe("0aaaaa");
    });

    it("should use the injected random source for every position", () => {
      // letter idx 1 -> 'b', digit idx 2 -> '2', fills 3,4,5,6 -> 'd','e','f','g'
      // shuffle draws: 5 % 6, 5 % 5, 5 % 4, 5 % 3, 5 % 2
      const id = generateShortId(sequenceSource([1, 2, 3, 4, 5, 6, 5, 5, 5, 5, 5]));
      expect(id.split("").sort().join("")).toBe("2bdefg");
    });
  });
});

describe("Short ID Validation", () => {
  describe("validateShortId", () => {
    it("should accept a valid ID", () => {
      expect(validateShortId("abc123")).toEqual({ valid: true });
    });

    it("should reject IDs shorter than 6 characters", () => {
      expect(validateShortId("abc1")).toEqual({
        valid: false,
        rule: "minLength",
        error: "Short ID must be at least 6 characters long",
      });
    });

    it("should reject IDs without a letter", () => {
      expect(validateShortId("123456")).toEqual({
        valid: false,
        rule: "letter",
        error: "Short ID must contain at least one letter",
      });
    });

    it("should reject IDs without a digit", () => {
      expect(validateShortId("abcdef")).toEqual({
        valid: false,
        rule: "digit",
        error: "Short ID must contain at least one digit",
      });
    });

    it("should reject IDs containing whitespace", () => {
      expect(validateShortId("abc 123")).toEqual({
        valid: false,
        rule: "whitespace",
        error: "Short ID must not contain whitespace",
      });
      expect(validateShortId("abc123\t")).toMatchObject({ valid: false, rule: "whitespace" });
    });

    it("should report the first failing rule", () => {
      // Too short and no digit: length is checked first
      expect(validateShortId("ab c")).toMatchObject({ rule: "minLength" });
      // Long enough, no letter, has whitespace: letter is checked before whitespace
      expect(validateShortId("123 456")).toMatchObject({ rule: "letter" });
    });

    it("should reject IDs longer than the column width", () => {
      const id = "a1".repeat(33);
      expect(validateShortId(id)).toEqual({
        valid: false,
        rule: "maxLength",
        error: "Short ID must be at most 64 characters long",
      });
    });

    it("should accept IDs at the length bounds", () => {
      expect(validateShortId("a1b2c3")).toEqual({ valid: true });
      expect(validateShortId("a1".repeat(32))).toEqual({ valid: true });
    });

    it("should treat missing values as not provided", () => {
      expect(validateShortId(undefined)).toEqual({ valid: true });
      expect(validateShortId(null)).toEqual({ valid: true });
      expect(validateShortId("")).toEqual({ valid: true });
    });
  });

  describe("isBlank", () => {
    it("should detect absent values only", () => {
      expect(isBlank(undefined)).toBe(true);
      expect(isBlank(null)).toBe(true);
      expect(isBlank("")).toBe(true);
      expect(isBlank(" ")).toBe(false);
      expect(isBlank("abc123")).toBe(false);
    });
  });
});
