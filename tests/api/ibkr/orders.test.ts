/**
 * Order Placement Tests
 */

import { describe, it, expect, beforeEach } from "vitest";
import { ZodError } from "zod";
import {
  cancelOwnedOrder,
  computeOrderQuantity,
  debugLimitPrice,
  placeNotionalOrder,
  roundHalfEven,
} from "../../../src/api/ibkr/orders.js";
import { Book } from "../../../src/trading/book.js";
import {
  NotConnectedError,
  OrderNotFoundError,
  OrderOwnershipError,
  PriceUnavailableError,
} from "../../../src/types/errors.js";
import { SimulatedGateway } from "../../../mock/simulated-gateway.js";
import { instrument, order } from "../../fixtures.js";

const acme = instrument(1, "ACME");
const time = new Date("2024-03-15T15:00:00Z");

describe("roundHalfEven", () => {
  it("should round ties to the even neighbour", () => {
    expect(roundHalfEven(2.5)).toBe(2);
    expect(roundHalfEven(3.5)).toBe(4);
    expect(roundHalfEven(2.4)).toBe(2);
    expect(roundHalfEven(2.6)).toBe(3);
  });
});

describe("computeOrderQuantity", () => {
  it("should divide notional by price", () => {
    expect(computeOrderQuantity(1000, 100)).toBe(10);
  });

  it("should buy at least one unit of a pricey instrument", () => {
    expect(computeOrderQuantity(50, 100)).toBe(1);
  });

  it("should round fractional quantities", () => {
    expect(computeOrderQuantity(250, 100)).toBe(2);
    expect(computeOrderQuantity(350, 100)).toBe(4);
    expect(computeOrderQuantity(1049, 100)).toBe(10);
  });

  it("should leave a zero notional at zero", () => {
    expect(computeOrderQuantity(0, 100)).toBe(0);
  });

  it("should refuse to size on a non-positive price", () => {
    expect(() => computeOrderQuantity(1000, 0)).toThrow(RangeError);
    expect(() => computeOrderQuantity(1000, -1)).toThrow(RangeError);
  });
});

describe("debugLimitPrice", () => {
  it("should move the limit away from the market", () => {
    expect(debugLimitPrice(100, "BUY")).toBe(90);
    expect(debugLimitPrice(100, "SELL")).toBe(110);
    expect(debugLimitPrice(12.34, "BUY")).toBe(11.11);
  });
});

describe("placeNotionalOrder", () => {
  let link: SimulatedGateway;

  beforeEach(async () => {
    link = new SimulatedGateway();
    await link.connect();
  });

  it("should size a limit order at the bid", async () => {
    link.setTicker({ conId: 1, bid: 100, last: 101, time });

    const placed = await placeNotionalOrder(link, acme, "BUY", 1000);

    expect(placed.price).toBe(100);
    expect(placed.request).toEqual({ action: "BUY", quantity: 10, orderType: "LMT", limitPrice: 100 });
    expect(link.calls).toEqual(["connect", "contractTicks:1:snapshot", "placeOrder:1"]);
  });

  it("should fall back to the last trade without a bid", async () => {
    link.setTicker({ conId: 1, last: 20, time });

    const placed = await placeNotionalOrder(link, acme, "SELL", 100);

    expect(placed.price).toBe(20);
    expect(placed.request.quantity).toBe(5);
  });

  it("should shift the limit in debug mode", async () => {
    link.setTicker({ conId: 1, bid: 100, time });

    const placed = await placeNotionalOrder(link, acme, "BUY", 1000, { debug: true });

    expect(placed.request.limitPrice).toBe(90);
    expect(placed.request.quantity).toBe(10);
  });

  it("should follow the order's progress", async () => {
    link.setTicker({ conId: 1, bid: 100, time });

    const placed = await placeNotionalOrder(link, acme, "BUY", 1000);
    const first = await placed.progress.waitValue();
    expect(first.orderId).toBe(1);
    expect(first.status).toBe("submitted");

    link.reportOrderStatus(1, "Filled", 10, 0, 99.5);

    expect(placed.progress.value?.status).toBe("filled");
    expect(placed.progress.value?.avgFillPrice).toBe(99.5);
    expect(placed.progress.isClosed).toBe(true);
  });

  it("should reject a snapshot without a price", async () => {
    link.setTicker({ conId: 1, time });

    await expect(placeNotionalOrder(link, acme, "BUY", 1000)).rejects.toBeInstanceOf(PriceUnavailableError);
    expect(link.count("placeOrder:1")).toBe(0);
  });

  it("should pass on a failed snapshot", async () => {
    await expect(placeNotionalOrder(link, acme, "BUY", 1000)).rejects.toThrow("No market data for conId 1");
  });

  it("should not touch the gateway when disconnected", async () => {
    link.dropConnection();
    link.setTicker({ conId: 1, bid: 100, time });

    await expect(placeNotionalOrder(link, acme, "BUY", 1000)).rejects.toBeInstanceOf(NotConnectedError);
    expect(link.calls).toEqual(["connect"]);
  });

  it("should validate the notional", async () => {
    link.setTicker({ conId: 1, bid: 100, time });

    await expect(placeNotionalOrder(link, acme, "BUY", -5)).rejects.toBeInstanceOf(ZodError);
    expect(link.calls).toEqual(["connect"]);
  });
});

describe("cancelOwnedOrder", () => {
  let link: SimulatedGateway;
  let book: Book;

  beforeEach(async () => {
    link = new SimulatedGateway({ clientId: 1 });
    await link.connect();
    book = new Book();
  });

  it("should cancel an order this client placed", () => {
    book.recordOrder(order(5, 1));

    const trade = cancelOwnedOrder(link, book, 5);

    expect(trade.order.orderId).toBe(5);
    expect(link.calls).toEqual(["connect", "cancelOrder:5"]);
  });

  it("should refuse an order owned by another client", () => {
    book.recordOrder(order(7, 2));

    expect(() => cancelOwnedOrder(link, book, 7)).toThrow(OrderOwnershipError);
    expect(link.calls).toEqual(["connect"]);
  });

  it("should refuse an order missing from the book", () => {
    expect(() => cancelOwnedOrder(link, book, 42)).toThrow(OrderNotFoundError);
    expect(link.calls).toEqual(["connect"]);
  });

  it("should refuse when disconnected", () => {
    book.recordOrder(order(5, 1));
    link.dropConnection();

    expect(() => cancelOwnedOrder(link, book, 5)).toThrow(NotConnectedError);
    expect(link.count("cancelOrder:5")).toBe(0);
  });
});
