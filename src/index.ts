/**
 * Brokerage session entry point
 *
 * Connects to TWS / IB Gateway, keeps orders, holdings and market data
 * subscriptions in sync across reconnects, and serves the status and
 * command API.
 */

import { pathToFileURL } from "url";
import { loadConfig, type Config } from "./config/index.js";
import { logger } from "./utils/logger.js";
import { IbkrGatewayLink } from "./api/ibkr/gateway-link.js";
import { JsonUniverseStore } from "./storage/universe-store.js";
import { InstrumentCatalog } from "./storage/instrument-catalog.js";
import { TradingSession } from "./session/trading-session.js";
import { createServer } from "./server.js";

export function createSession(config: Config): TradingSession {
  const link = new IbkrGatewayLink(config.gateway);
  const catalog = new InstrumentCatalog(new JsonUniverseStore(config.catalog.dataDir));
  return new TradingSession(link, catalog, {
    marketDataType: config.marketData.type,
    subscription: {
      historyDays: config.marketData.historyDays,
      barSize: config.marketData.barSize,
      whatToShow: "TRADES",
      defaultTimezone: config.marketData.timezone,
    },
    backoff: config.backoff,
  });
}

async function main(): Promise<void> {
  const config = loadConfig();
  logger.level = config.logLevel;

  logger.info("═══ Brokerage session ═══");
  logger.info(`Environment: ${config.nodeEnv}`);
  logger.info(`IBKR: ${config.gateway.host}:${config.gateway.port} (clientId ${config.gateway.clientId})`);

  const session = createSession(config);

  session.on("fatal", (error) => {
    logger.error(`Lost the gateway for good, exiting: ${error.message}`);
    process.exit(1);
  });
  session.on("itemError", (error, item) => {
    logger.warn(`Holding ${item.contract.symbol} not reconciled: ${error.message}`);
  });

  const app = createServer(session);
  const server = app.listen(config.port, () => {
    logger.info(`API listening on http://localhost:${config.port}`);
  });

  // ── Graceful Shutdown ─────────────────────────────────────
  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down...`);
    session.stop();
    server.close(() => process.exit(0));
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  await session.start();
  logger.info("Session running. Waiting for commands...");
}

// ── Exports ─────────────────────────────────────────────────
export { TradingSession } from "./session/trading-session.js";
export { ConnectionSupervisor } from "./session/connection-supervisor.js";
export { SubscriptionReconciler } from "./session/subscription-reconciler.js";
export { CachedObserver } from "./reactive/cached-observer.js";
export { InstrumentCatalog, PORTFOLIO_UNIVERSE } from "./storage/instrument-catalog.js";
export { JsonUniverseStore, Universe } from "./storage/universe-store.js";
export { IbkrGatewayLink } from "./api/ibkr/gateway-link.js";
export { computeOrderQuantity } from "./api/ibkr/orders.js";
export { createServer } from "./server.js";
export { loadConfig } from "./config/index.js";

// Run if executed directly
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((err: unknown) => {
    logger.error("Fatal error", { error: err instanceof Error ? err.message : String(err) });
    process.exit(1);
  });
}
