/**
 * Redis Client Factory Tests
 */

import { describe, it, expect, jest } from "@jest/globals";

// Mock ioredis
jest.mock("ioredis", () => ({
  __esModule: true,
  default: jest.fn().mockImplementation(() => ({ on: jest.fn() })),
}));

import Redis from "ioredis";
import { createRedisClient, reconnectDelay } from "../src/client.js";

describe("createRedisClient", () => {
  it("should apply default timeouts and fail-fast settings", () => {
    createRedisClient({ url: "redis://localhost:6379" });

    expect(Redis).toHaveBeenCalledWith(
      "redis://localhost:6379",
      expect.objectContaining({
        connectTimeout: 5000,
        commandTimeout: 500,
        maxRetriesPerRequest: 1,
        enableOfflineQueue: false,
      })
    );
  });

  it("should honor explicit options", () => {
    createRedisClient({ url: "redis://cache:6379", commandTimeoutMs: 250, maxRetriesPerRequest: 2 });

    expect(Redis).toHaveBeenCalledWith(
      "redis://cache:6379",
      expect.objectContaining({ commandTimeout: 250, maxRetriesPerRequest: 2 })
    );
  });
});

describe("reconnectDelay", () => {
  it("should back off linearly up to the cap", () => {
    expect(reconnectDelay(1)).toBe(100);
    expect(reconnectDelay(5)).toBe(500);
    expect(reconnectDelay(10)).toBe(1000);
    expect(reconnectDelay(30, 50)).toBe(2000);
  });

  it("should stop after the last attempt", () => {
    expect(reconnectDelay(11)).toBeNull();
    expect(reconnectDelay(4, 3)).toBeNull();
  });
});
