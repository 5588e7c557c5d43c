/**
 * Configuration Tests
 */

import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { loadConfig } from "../../src/config/index.js";

describe("loadConfig", () => {
  it("should fill in defaults", () => {
    const config = loadConfig({});

    expect(config.gateway).toEqual({
      host: "127.0.0.1",
      port: 7497,
      clientId: 1,
      connectTimeoutMs: 10_000,
    });
    expect(config.backoff.maxAttempts).toBe(10);
    expect(config.marketData).toEqual({
      type: "delayed",
      historyDays: 30,
      barSize: "1 min",
      timezone: "America/New_York",
    });
    expect(config.catalog.dataDir).toBe("./data");
    expect(config.port).toBe(3000);
  });

  it("should read overrides from the environment", () => {
    const config = loadConfig({
      IBKR_HOST: "gateway.local",
      IBKR_PORT: "4002",
      IBKR_CLIENT_ID: "7",
      MARKET_DATA_TYPE: "live",
      EXCHANGE_TIMEZONE: "Europe/London",
      RECONNECT_MAX_ATTEMPTS: "3",
    });

    expect(config.gateway.host).toBe("gateway.local");
    expect(config.gateway.port).toBe(4002);
    expect(config.gateway.clientId).toBe(7);
    expect(config.marketData.type).toBe("live");
    expect(config.marketData.timezone).toBe("Europe/London");
    expect(config.backoff.maxAttempts).toBe(3);
  });

  it("should reject an unknown time zone", () => {
    expect(() => loadConfig({ EXCHANGE_TIMEZONE: "Mars/Olympus_Mons" })).toThrow(ZodError);
  });

  it("should reject an unknown market data type", () => {
    expect(() => loadConfig({ MARKET_DATA_TYPE: "streaming" })).toThrow(ZodError);
  });
});
