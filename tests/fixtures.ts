/**
 * Shared test data and in-memory stand-ins.
 */

import { Universe, type UniverseStore } from "../src/storage/universe-store.js";
import type { Instrument } from "../src/types/market.js";
import type { Order } from "../src/types/orders.js";
import type { PortfolioItem } from "../src/types/portfolio.js";

export function instrument(conId: number, symbol: string, extra: Partial<Instrument> = {}): Instrument {
  return {
    conId,
    symbol,
    secType: "STK",
    exchange: "SMART",
    primaryExchange: "NASDAQ",
    currency: "USD",
    timeZoneId: "America/New_York",
    ...extra,
  };
}

export function holding(
  conId: number,
  symbol: string,
  quantity = 10,
  account = "DU0000001"
): PortfolioItem {
  return {
    account,
    contract: { conId, symbol, secType: "STK" },
    quantity,
    marketPrice: 100,
    marketValue: quantity * 100,
    averageCost: 90,
    unrealizedPnL: quantity * 10,
    realizedPnL: 0,
  };
}

export function order(orderId: number, clientId: number, extra: Partial<Order> = {}): Order {
  return {
    orderId,
    clientId,
    contract: { conId: 1, symbol: "ACME", secType: "STK" },
    action: "BUY",
    quantity: 10,
    orderType: "LMT",
    limitPrice: 100,
    status: "open",
    ...extra,
  };
}

/** UniverseStore kept in memory, counting writes */
export class MemoryUniverseStore implements UniverseStore {
  readonly writes: string[] = [];
  private readonly data = new Map<string, Instrument[]>();
  private opened = false;

  constructor(seed: Record<string, Instrument[]> = {}) {
    for (const [name, instruments] of Object.entries(seed)) this.data.set(name, instruments);
  }

  async open(): Promise<void> {
    this.opened = true;
  }

  isOpen(): boolean {
    return this.opened;
  }

  async get(name: string): Promise<Universe> {
    return new Universe(name, this.data.get(name) ?? []);
  }

  async getAll(): Promise<Universe[]> {
    return Array.from(this.data, ([name, instruments]) => new Universe(name, instruments));
  }

  async update(universe: Universe): Promise<void> {
    this.writes.push(universe.name);
    this.data.set(universe.name, universe.instruments());
  }

  stored(name: string): Instrument[] {
    return this.data.get(name) ?? [];
  }
}

export const noSleep = async (): Promise<void> => undefined;
