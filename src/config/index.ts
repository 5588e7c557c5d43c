/**
 * Centralized configuration loaded from environment variables.
 * Uses zod for runtime validation.
 */

import { z } from "zod";
import dotenv from "dotenv";
import { isValidTimeZone } from "../utils/time.js";

dotenv.config();

export const MarketDataTypeSchema = z.enum(["live", "frozen", "delayed", "delayed_frozen"]);
export type MarketDataMode = z.infer<typeof MarketDataTypeSchema>;

export const BarSizeSchema = z.enum(["1 min", "5 mins", "15 mins", "1 hour", "1 day"]);

const ConfigSchema = z.object({
  // IBKR gateway
  gateway: z.object({
    host: z.string().default("127.0.0.1"),
    port: z.coerce.number().int().positive().default(7497),
    clientId: z.coerce.number().int().nonnegative().default(1),
    connectTimeoutMs: z.coerce.number().int().positive().default(10_000),
  }),

  // Reconnect backoff
  backoff: z.object({
    maxAttempts: z.coerce.number().int().positive().default(10),
    maxElapsedMs: z.coerce.number().int().positive().default(120_000),
    initialDelayMs: z.coerce.number().int().nonnegative().default(1_000),
    maxDelayMs: z.coerce.number().int().positive().default(60_000),
  }),

  // Market data subscriptions opened for holdings
  marketData: z.object({
    type: MarketDataTypeSchema.default("delayed"),
    historyDays: z.coerce.number().int().positive().default(30),
    barSize: BarSizeSchema.default("1 min"),
    timezone: z.string().refine(isValidTimeZone, "Unknown time zone").default("America/New_York"),
  }),

  // Universe catalog persistence
  catalog: z.object({
    dataDir: z.string().default("./data"),
  }),

  // System
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
  port: z.coerce.number().int().nonnegative().default(3000),
});

export type Config = z.infer<typeof ConfigSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const raw = {
    gateway: {
      host: env.IBKR_HOST,
      port: env.IBKR_PORT,
      clientId: env.IBKR_CLIENT_ID,
      connectTimeoutMs: env.IBKR_CONNECT_TIMEOUT_MS,
    },
    backoff: {
      maxAttempts: env.RECONNECT_MAX_ATTEMPTS,
      maxElapsedMs: env.RECONNECT_MAX_ELAPSED_MS,
      initialDelayMs: env.RECONNECT_INITIAL_DELAY_MS,
      maxDelayMs: env.RECONNECT_MAX_DELAY_MS,
    },
    marketData: {
      type: env.MARKET_DATA_TYPE,
      historyDays: env.HISTORY_DAYS,
      barSize: env.BAR_SIZE,
      timezone: env.EXCHANGE_TIMEZONE,
    },
    catalog: {
      dataDir: env.DATA_DIR,
    },
    logLevel: env.LOG_LEVEL,
    nodeEnv: env.NODE_ENV,
    port: env.PORT,
  };

  return ConfigSchema.parse(raw);
}
