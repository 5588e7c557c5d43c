/**
 * Brokerage gateway contract.
 *
 * The session layer only talks to the gateway through this surface:
 * lifecycle events, push streams, a few snapshot queries and commands.
 * The IBKR implementation lives in api/ibkr/gateway-link.ts; tests use
 * the in-process simulator under mock/.
 */

import type { EventEmitter } from "eventemitter3";
import type { Observable } from "rxjs";
import type { MarketDataMode } from "../config/index.js";
import type { BarRequest, ContractRef, Instrument, PriceBar, Ticker } from "./market.js";
import type { Order, OrderEvent, OrderRequest, OrderResult } from "./orders.js";
import type { PortfolioItem, PositionRecord } from "./portfolio.js";

/** Lifecycle events raised by a gateway link */
export interface GatewayLinkEvents {
  connected: () => void;
  disconnected: (reason: string) => void;
  error: (error: Error) => void;
}

export interface TickerRequest {
  /** Deliver one snapshot and complete instead of streaming */
  snapshot: boolean;
}

export interface GatewayLink extends EventEmitter<GatewayLinkEvents> {
  /** API client id this link connects as; owns the orders it places */
  readonly clientId: number;

  isConnected(): boolean;

  /**
   * Open the connection. Rejects with ConnectionRefusedError when the
   * gateway refuses, resets or does not answer in time.
   */
  connect(): Promise<void>;

  disconnect(): void;

  // ── Streams ───────────────────────────────────────────────

  /** Batches of positions (quantity + average cost) */
  positions(): Observable<PositionRecord[]>;

  /** Holdings with market value and P&L, one item per update */
  portfolioItems(): Observable<PortfolioItem>;

  /** Order lifecycle events for every order the gateway reports */
  orderEvents(): Observable<OrderEvent>;

  contractTicks(contract: ContractRef, request: TickerRequest): Observable<Ticker>;

  /** Historical backfill for the range, then live bars */
  historicalBars(contract: ContractRef, request: BarRequest): Observable<PriceBar>;

  // ── Snapshots ─────────────────────────────────────────────

  /** Holdings the link already knows about, synchronously */
  portfolioSnapshot(): PortfolioItem[];

  /** Authoritative list of all open orders */
  openOrders(): Promise<Order[]>;

  contractDetails(contract: ContractRef): Promise<Instrument[]>;

  // ── Commands ──────────────────────────────────────────────

  /** Place an order; the stream reports its progress */
  placeOrder(contract: ContractRef, request: OrderRequest): Observable<OrderResult>;

  cancelOrder(orderId: number): void;

  setMarketDataType(mode: MarketDataMode): void;

  /**
   * Ask the gateway to cancel every open order, whichever client placed
   * it. Outcomes arrive on the order-event stream.
   */
  globalCancel(): void;
}
