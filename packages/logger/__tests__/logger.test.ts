/**
 * Logger Tests
 */

import { describe, it, expect } from "@jest/globals";
import { buildLoggerOptions, createLogger } from "../src/index.js";

describe("Logger", () => {
  it("should prefix the logger name with the service name", () => {
    const options = buildLoggerOptions("sweeper", "debug");
    expect(options.name).toBe("linkvault:sweeper");
    expect(options.base).toEqual({ service: "sweeper", env: "test" });
  });

  it("should silence output under test", () => {
    // Jest sets NODE_ENV=test
    expect(buildLoggerOptions("api", "debug").level).toBe("silent");
    expect(createLogger("api").level).toBe("silent");
  });

  it("should format levels as labels", () => {
    const format = buildLoggerOptions("api").formatters?.level;
    expect(format?.("warn", 40)).toEqual({ level: "warn" });
  });
});
