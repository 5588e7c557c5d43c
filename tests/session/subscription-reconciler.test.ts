/**
 * Subscription Reconciler Tests
 */

import { describe, it, expect, beforeEach } from "vitest";
import { SubscriptionReconciler } from "../../src/session/subscription-reconciler.js";
import { MarketDataStreams } from "../../src/api/ibkr/streams.js";
import { Book } from "../../src/trading/book.js";
import { Portfolio } from "../../src/trading/portfolio.js";
import { InstrumentCatalog } from "../../src/storage/instrument-catalog.js";
import { InstrumentResolutionError } from "../../src/types/errors.js";
import type { PortfolioItem } from "../../src/types/portfolio.js";
import { SimulatedGateway } from "../../mock/simulated-gateway.js";
import { MemoryUniverseStore, holding, instrument, order } from "../fixtures.js";

describe("SubscriptionReconciler", () => {
  let link: SimulatedGateway;
  let store: MemoryUniverseStore;
  let book: Book;
  let portfolio: Portfolio;
  let marketData: MarketDataStreams;
  let reconciler: SubscriptionReconciler;
  let itemErrors: Array<{ error: Error; item: PortfolioItem }>;

  beforeEach(async () => {
    link = new SimulatedGateway();
    await link.connect();
    store = new MemoryUniverseStore();
    const catalog = new InstrumentCatalog(store);
    await catalog.load();
    book = new Book();
    portfolio = new Portfolio();
    marketData = new MarketDataStreams(link);
    reconciler = new SubscriptionReconciler(link, book, portfolio, catalog, marketData, {
      marketDataType: "delayed",
      subscription: {
        historyDays: 30,
        barSize: "1 min",
        whatToShow: "TRADES",
        defaultTimezone: "America/New_York",
      },
    });
    itemErrors = [];
    reconciler.on("itemError", (error, item) => itemErrors.push({ error, item }));

    link.addInstrument(instrument(1, "ACME"));
    link.addInstrument(instrument(2, "GLOBEX"));
  });

  it("should subscribe to order events before replaying open orders", async () => {
    await reconciler.reestablish();

    expect(link.calls).toEqual([
      "connect",
      "orderEvents",
      "positions",
      "portfolioItems",
      "portfolioSnapshot",
      "setMarketDataType:delayed",
      "openOrders",
    ]);
  });

  it("should book open orders from the snapshot", async () => {
    link.setOpenOrders([order(3, 1), order(4, 2)]);

    await reconciler.reestablish();

    expect(book.size).toBe(2);
    expect(book.get(4)?.order.clientId).toBe(2);
  });

  it("should resolve each instrument once and stream it once", async () => {
    link.setPortfolioSnapshot([
      holding(1, "ACME", 10, "DU0000001"),
      holding(1, "ACME", 5, "DU0000002"),
      holding(2, "GLOBEX"),
    ]);

    await reconciler.reestablish();

    expect(link.count("contractDetails:1")).toBe(1);
    expect(link.count("contractDetails:2")).toBe(1);
    expect(link.count("historicalBars:1")).toBe(1);
    expect(link.count("historicalBars:2")).toBe(1);
    expect(store.stored("portfolio").map((i) => i.conId)).toEqual([1, 2]);
    expect(portfolio.items()).toHaveLength(3);
  });

  it("should change nothing when run again on a healthy session", async () => {
    link.setPortfolioSnapshot([holding(1, "ACME"), holding(2, "GLOBEX")]);
    link.setOpenOrders([order(3, 1)]);
    await reconciler.reestablish();
    const writes = store.writes.length;

    await reconciler.reestablish();

    expect(link.count("contractDetails:1")).toBe(1);
    expect(link.count("historicalBars:1")).toBe(1);
    expect(link.count("historicalBars:2")).toBe(1);
    expect(store.writes).toHaveLength(writes);
    expect(marketData.size).toBe(2);
    expect(book.size).toBe(1);
  });

  it("should skip a holding that cannot be resolved and carry on", async () => {
    link.failResolution(2);
    link.setPortfolioSnapshot([holding(1, "ACME"), holding(2, "GLOBEX")]);

    await reconciler.reestablish();

    expect(itemErrors).toHaveLength(1);
    expect(itemErrors[0]?.error).toBeInstanceOf(InstrumentResolutionError);
    expect(itemErrors[0]?.item.contract.conId).toBe(2);
    expect(marketData.has(1)).toBe(true);
    expect(marketData.has(2)).toBe(false);
    expect(store.stored("portfolio").map((i) => i.conId)).toEqual([1]);
  });

  it("should report a holding the gateway has no details for", async () => {
    link.setPortfolioSnapshot([holding(3, "GHOST")]);

    await reconciler.reestablish();

    expect(itemErrors[0]?.error.message).toBe(
      "Could not resolve GHOST (conId 3): no contract details returned"
    );
    expect(marketData.size).toBe(0);
  });

  it("should reconcile holdings that arrive on the stream", async () => {
    await reconciler.reestablish();

    link.pushPortfolioItem(holding(1, "ACME"));
    await reconciler.settled();

    expect(marketData.has(1)).toBe(true);
    expect(portfolio.item("DU0000001", 1)?.quantity).toBe(10);
    expect(store.stored("portfolio").map((i) => i.conId)).toEqual([1]);
  });

  it("should reconcile a closed holding without keeping it in the portfolio", async () => {
    await reconciler.reestablish();

    link.pushPortfolioItem(holding(1, "ACME", 0));
    await reconciler.settled();

    expect(portfolio.items()).toEqual([]);
    expect(marketData.has(1)).toBe(true);
  });

  it("should feed position batches into the portfolio", async () => {
    await reconciler.reestablish();

    link.pushPositions([
      { account: "DU0000001", contract: { conId: 1, symbol: "ACME", secType: "STK" }, quantity: 10, averageCost: 90 },
    ]);

    expect(portfolio.position("DU0000001", 1)?.averageCost).toBe(90);
  });

  it("should let go of every stream on detach", async () => {
    link.setPortfolioSnapshot([holding(1, "ACME")]);
    await reconciler.reestablish();
    expect(link.openBarStreams()).toBe(1);

    reconciler.detach();
    link.pushOrderEvent({ type: "open", order: order(9, 1), rawStatus: "Submitted" });
    link.pushPositions([
      { account: "DU0000001", contract: { conId: 2, symbol: "GLOBEX", secType: "STK" }, quantity: 1, averageCost: 1 },
    ]);

    expect(link.openBarStreams()).toBe(0);
    expect(marketData.size).toBe(0);
    expect(book.get(9)).toBeUndefined();
    expect(portfolio.positions()).toEqual([]);
  });

  it("should forget events held for orders that never opened on detach", async () => {
    await reconciler.reestablish();
    link.pushOrderEvent({ type: "cancel", orderId: 40 });
    expect(book.pendingCount).toBe(1);

    reconciler.detach();

    expect(book.pendingCount).toBe(0);
  });

  it("should reopen streams after a detach without resolving again", async () => {
    link.setPortfolioSnapshot([holding(1, "ACME")]);
    await reconciler.reestablish();
    reconciler.detach();

    await reconciler.reestablish();

    expect(link.count("historicalBars:1")).toBe(2);
    expect(link.count("contractDetails:1")).toBe(1);
    expect(link.openBarStreams()).toBe(1);
  });
});
