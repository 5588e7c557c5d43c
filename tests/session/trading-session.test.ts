/**
 * Trading Session Tests
 */

import { describe, it, expect, beforeEach } from "vitest";
import { TradingSession } from "../../src/session/trading-session.js";
import { InstrumentCatalog } from "../../src/storage/instrument-catalog.js";
import {
  ConnectionExhaustedError,
  InstrumentResolutionError,
  NotConnectedError,
  OrderOwnershipError,
} from "../../src/types/errors.js";
import { SimulatedGateway } from "../../mock/simulated-gateway.js";
import { MemoryUniverseStore, holding, instrument, noSleep, order } from "../fixtures.js";

describe("TradingSession", () => {
  let link: SimulatedGateway;
  let store: MemoryUniverseStore;
  let session: TradingSession;

  beforeEach(() => {
    link = new SimulatedGateway({ clientId: 1 });
    link.addInstrument(instrument(1, "ACME"));
    link.setPortfolioSnapshot([holding(1, "ACME")]);

    store = new MemoryUniverseStore({
      portfolio: [instrument(9, "OLDCO")],
      watchlist: [instrument(1, "ACME"), instrument(2, "GLOBEX")],
    });
    session = new TradingSession(link, new InstrumentCatalog(store), {
      marketDataType: "delayed",
      subscription: {
        historyDays: 30,
        barSize: "1 min",
        whatToShow: "TRADES",
        defaultTimezone: "America/New_York",
      },
      backoff: { maxAttempts: 3, maxElapsedMs: 60_000, initialDelayMs: 1_000, maxDelayMs: 10_000 },
      sleep: noSleep,
      now: () => 0,
    });
  });

  describe("start", () => {
    it("should rebuild the portfolio universe from current holdings", async () => {
      await session.start();

      expect(store.stored("portfolio").map((i) => i.symbol)).toEqual(["ACME"]);
      expect(session.marketData.has(1)).toBe(true);
      expect(session.portfolio.items()).toHaveLength(1);
    });

    it("should report connection and store status", async () => {
      expect(session.isConnected()).toBe(false);
      expect(session.status()).toEqual({
        gatewayConnected: false,
        storeConnected: false,
        state: "disconnected",
      });

      await session.start();

      expect(session.isConnected()).toBe(true);
      expect(session.status()).toEqual({
        gatewayConnected: true,
        storeConnected: true,
        state: "connected",
      });
    });

    it("should pass on reconciliation failures for single holdings", async () => {
      const failed: number[] = [];
      session.on("itemError", (error, item) => {
        if (error instanceof InstrumentResolutionError) failed.push(item.contract.conId);
      });
      link.setPortfolioSnapshot([holding(1, "ACME"), holding(5, "NOPE")]);

      await session.start();

      expect(failed).toEqual([5]);
      expect(session.marketData.has(1)).toBe(true);
    });
  });

  describe("reconnect", () => {
    it("should keep the portfolio universe and reopen streams", async () => {
      await session.start();

      await session.reconnect();

      expect(store.stored("portfolio").map((i) => i.symbol)).toEqual(["ACME"]);
      expect(link.count("contractDetails:1")).toBe(1);
      expect(link.count("historicalBars:1")).toBe(2);
      expect(session.status().state).toBe("connected");
    });

    it("should report a fatal error when the gateway stays away", async () => {
      await session.start();
      const fatal = new Promise<Error>((resolve) => session.once("fatal", resolve));

      link.refuseConnections(100);
      link.dropConnection();

      expect(await fatal).toBeInstanceOf(ConnectionExhaustedError);
      expect(session.isConnected()).toBe(false);
    });
  });

  describe("lookups", () => {
    it("should find instruments in any loaded universe", async () => {
      await session.start();

      expect(session.findInstrument(2)?.symbol).toBe("GLOBEX");
      expect(session.findInstrument(404)).toBeUndefined();
      expect(session.getUniverses().map((u) => u.name)).toEqual(["portfolio", "watchlist"]);
    });
  });

  describe("orders", () => {
    beforeEach(async () => {
      link.setOpenOrders([order(7, 2), order(8, 1, { status: "filled" })]);
      await session.start();
    });

    it("should place an order and book it", async () => {
      link.setTicker({ conId: 1, bid: 50, time: new Date("2024-03-15T15:00:00Z") });

      const placed = await session.placeOrder(instrument(1, "ACME"), "BUY", 500);

      expect(placed.request.quantity).toBe(10);
      expect(session.book.get(1)?.order.clientId).toBe(1);
      expect(session.book.get(1)?.order.limitPrice).toBe(50);
    });

    it("should cancel its own order", async () => {
      link.setTicker({ conId: 1, bid: 50, time: new Date("2024-03-15T15:00:00Z") });
      await session.placeOrder(instrument(1, "ACME"), "BUY", 500);

      session.cancelOrder(1);

      expect(link.count("cancelOrder:1")).toBe(1);
    });

    it("should refuse to cancel another client's order", () => {
      const calls = link.calls.length;

      expect(() => session.cancelOrder(7)).toThrow(OrderOwnershipError);
      expect(link.calls).toHaveLength(calls);
    });

    it("should cancel every working order on the red button", () => {
      session.redButton();

      expect(link.count("globalCancel")).toBe(1);
      expect(link.count("cancelOrder:7")).toBe(0);
      expect(session.book.get(7)?.order.status).toBe("cancelled");
      expect(session.book.get(8)?.order.status).toBe("filled");
    });

    it("should refuse the red button when disconnected", () => {
      session.stop();

      expect(() => session.redButton()).toThrow(NotConnectedError);
      expect(link.count("globalCancel")).toBe(0);
      expect(session.status().state).toBe("disconnected");
    });
  });
});
