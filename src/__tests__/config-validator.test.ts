import { describe, it, expect } from "vitest";
import { LOG_LEVELS, validateConfig } from "../config-validator.js";
import type { GateConfig } from "../config.js";

function makeConfig(overrides: {
  host?: string;
  port?: number;
  intervalMs?: number;
  connectTimeoutMs?: number;
  level?: string;
} = {}): GateConfig {
  return {
    target: { host: overrides.host ?? "redis", port: overrides.port ?? 6379, name: "Redis" },
    service: { name: "backend service" },
    poll: {
      intervalMs: overrides.intervalMs ?? 1000,
      connectTimeoutMs: overrides.connectTimeoutMs ?? 3000,
    },
    logging: { level: overrides.level ?? "warn" },
  };
}

describe("validateConfig", () => {
  it("should pass validation for the default config", () => {
    const result = validateConfig(makeConfig());
    expect(result.errors).toEqual([]);
    expect(result.warnings).toEqual([]);
  });

  it("should return error for empty host", () => {
    const result = validateConfig(makeConfig({ host: "" }));
    expect(result.errors).toEqual(["Target host is required"]);
  });

  it("should return error for port too low", () => {
    const result = validateConfig(makeConfig({ port: 0 }));
    expect(result.errors).toContain("Target port must be between 1 and 65535, got 0");
  });

  it("should return error for port too high", () => {
    const result = validateConfig(makeConfig({ port: 65536 }));
    expect(result.errors).toContain("Target port must be between 1 and 65535, got 65536");
  });

  it("should return error for unparseable port", () => {
    const result = validateConfig(makeConfig({ port: NaN }));
    expect(result.errors).toContain("Target port must be between 1 and 65535, got NaN");
  });

  it("should return error for non-positive interval", () => {
    const result = validateConfig(makeConfig({ intervalMs: 0 }));
    expect(result.errors).toContain("poll.intervalMs must be a positive integer, got 0");
  });

  it("should return error for fractional connect timeout", () => {
    const result = validateConfig(makeConfig({ connectTimeoutMs: 1.5 }));
    expect(result.errors).toContain("poll.connectTimeoutMs must be a positive integer, got 1.5");
    expect(result.warnings).toEqual([]);
  });

  it("should warn for connect timeout above one minute", () => {
    const result = validateConfig(makeConfig({ connectTimeoutMs: 120_000 }));
    expect(result.errors).toEqual([]);
    expect(result.warnings).toEqual([
      "poll.connectTimeoutMs is 120000ms — a single unanswered attempt will block the wait that long",
    ]);
  });

  it("should return error for unknown log level", () => {
    const result = validateConfig(makeConfig({ level: "verbose" }));
    expect(result.errors).toEqual([
      'logging.level must be one of fatal, error, warn, info, debug, trace, silent, got "verbose"',
    ]);
  });

  it("should accept every pino level the logger accepts", () => {
    expect(LOG_LEVELS).toEqual(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);
    for (const level of LOG_LEVELS) {
      expect(validateConfig(makeConfig({ level })).errors).toEqual([]);
    }
  });

  it("should collect every error at once", () => {
    const result = validateConfig(makeConfig({ host: "", port: -1, intervalMs: -5 }));
    expect(result.errors).toHaveLength(3);
  });
});
