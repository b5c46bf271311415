/**
 * Tests for config.ts — parseApiKeys + loadConfig.
 */

import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { parseApiKeys, loadConfig } from "../src/config.js";

// =============================================================================
// parseApiKeys
// =============================================================================

describe("parseApiKeys", () => {
  it("returns empty array for empty string", () => {
    expect(parseApiKeys("")).toEqual([]);
    expect(parseApiKeys("   ")).toEqual([]);
  });

  it("parses comma-separated key:user entries", () => {
    expect(parseApiKeys("k1:alice, k2:bob ")).toEqual([
      { key: "k1", userId: "alice" },
      { key: "k2", userId: "bob" },
    ]);
  });

  it("throws on wrong number of parts", () => {
    expect(() => parseApiKeys("badentry")).toThrow("Invalid API_KEYS entry");
    expect(() => parseApiKeys("a:b:c")).toThrow("Invalid API_KEYS entry");
  });

  it("throws on empty key or user", () => {
    expect(() => parseApiKeys(":alice")).toThrow("API key cannot be empty");
    expect(() => parseApiKeys("k1:")).toThrow("User ID cannot be empty in API_KEYS");
  });

  it("throws on duplicate keys", () => {
    expect(() => parseApiKeys("k1:alice,k1:bob")).toThrow('Duplicate API key in API_KEYS: "k1"');
  });
});

// =============================================================================
// loadConfig
// =============================================================================

describe("loadConfig", () => {
  it("returns defaults when env is empty", () => {
    expect(loadConfig({})).toEqual({
      PORT: 3000,
      HOST: "0.0.0.0",
      LOG_LEVEL: "info",
      NODE_ENV: "development",
      API_KEYS: "",
      JWT_ISSUER: "centwise",
      DEFAULT_USER_ID: "local",
      STORE_DRIVER: "memory",
      DATABASE_PATH: "centwise.db",
      LOCK_TIMEOUT_MS: 5000,
      SEED_DEMO_DATA: false,
    });
  });

  it("parses overridden values", () => {
    const config = loadConfig({
      PORT: "8080",
      LOG_LEVEL: "debug",
      NODE_ENV: "production",
      STORE_DRIVER: "sqlite",
      DATABASE_PATH: "/var/lib/centwise/data.db",
      LOCK_TIMEOUT_MS: "250",
      SEED_DEMO_DATA: "true",
      JWT_SECRET: "test-secret",
    });
    expect(config.PORT).toBe(8080);
    expect(config.LOG_LEVEL).toBe("debug");
    expect(config.NODE_ENV).toBe("production");
    expect(config.STORE_DRIVER).toBe("sqlite");
    expect(config.DATABASE_PATH).toBe("/var/lib/centwise/data.db");
    expect(config.LOCK_TIMEOUT_MS).toBe(250);
    expect(config.SEED_DEMO_DATA).toBe(true);
    expect(config.JWT_SECRET).toBe("test-secret");
  });

  it("throws on invalid values", () => {
    expect(() => loadConfig({ PORT: "0" })).toThrow(ZodError);
    expect(() => loadConfig({ PORT: "99999" })).toThrow(ZodError);
    expect(() => loadConfig({ STORE_DRIVER: "postgres" })).toThrow(ZodError);
    expect(() => loadConfig({ SEED_DEMO_DATA: "yes" })).toThrow(ZodError);
    expect(() => loadConfig({ LOCK_TIMEOUT_MS: "0" })).toThrow(ZodError);
  });
});
