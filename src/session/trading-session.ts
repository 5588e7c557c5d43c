/**
 * Trading session: the root object strategy code and the HTTP surface talk to.
 *
 * Owns the Book, the Portfolio and the bar streams, and wires the
 * supervisor and reconciler around an injected gateway link and catalog.
 *
 * Usage:
 *   const session = new TradingSession(link, catalog, options);
 *   session.on("fatal", () => process.exit(1));
 *   await session.start();
 */

import { EventEmitter } from "eventemitter3";
import { componentLogger } from "../utils/logger.js";
import { NotConnectedError } from "../types/errors.js";
import { Book } from "../trading/book.js";
import { Portfolio } from "../trading/portfolio.js";
import { MarketDataStreams, type BarSinkFactory, type SubscriptionSpec } from "../api/ibkr/streams.js";
import {
  cancelOwnedOrder,
  placeNotionalOrder,
  type NotionalOrderOptions,
  type PlacedOrder,
} from "../api/ibkr/orders.js";
import { ConnectionSupervisor, type ConnectionState } from "./connection-supervisor.js";
import { SubscriptionReconciler } from "./subscription-reconciler.js";
import type { BackoffPolicy } from "../utils/backoff.js";
import type { MarketDataMode } from "../config/index.js";
import type { GatewayLink } from "../types/gateway.js";
import type { Instrument, InstrumentKey } from "../types/market.js";
import type { OrderAction, Trade } from "../types/orders.js";
import type { PortfolioItem } from "../types/portfolio.js";
import type { InstrumentCatalog } from "../storage/instrument-catalog.js";
import type { Universe } from "../storage/universe-store.js";

const log = componentLogger("session");

export interface TradingSessionOptions {
  marketDataType: MarketDataMode;
  subscription: SubscriptionSpec;
  backoff: BackoffPolicy;
  /** Where bars for each holding go; in-memory series by default */
  sinkFactory?: BarSinkFactory;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export interface SessionStatus {
  gatewayConnected: boolean;
  storeConnected: boolean;
  state: ConnectionState;
}

export interface SessionEvents {
  stateChange: (next: ConnectionState, previous: ConnectionState) => void;
  ready: () => void;
  fatal: (error: Error) => void;
  itemError: (error: Error, item: PortfolioItem) => void;
}

export class TradingSession extends EventEmitter<SessionEvents> {
  readonly book = new Book();
  readonly portfolio = new Portfolio();
  readonly marketData: MarketDataStreams;
  readonly reconciler: SubscriptionReconciler;
  readonly supervisor: ConnectionSupervisor;

  constructor(
    private readonly link: GatewayLink,
    private readonly catalog: InstrumentCatalog,
    options: TradingSessionOptions
  ) {
    super();
    this.marketData = new MarketDataStreams(link, options.sinkFactory);
    this.reconciler = new SubscriptionReconciler(
      link,
      this.book,
      this.portfolio,
      catalog,
      this.marketData,
      { marketDataType: options.marketDataType, subscription: options.subscription }
    );
    this.supervisor = new ConnectionSupervisor(link, this.reconciler, {
      backoff: options.backoff,
      sleep: options.sleep,
      now: options.now,
    });

    this.supervisor.on("stateChange", (next, previous) => this.emit("stateChange", next, previous));
    this.supervisor.on("ready", () => this.emit("ready"));
    this.supervisor.on("fatal", (error) => this.emit("fatal", error));
    this.reconciler.on("itemError", (error, item) => this.emit("itemError", error, item));
  }

  // ─── Lifecycle ────────────────────────────────────────────

  /**
   * Load the catalog, start the portfolio universe from scratch and
   * connect. Rejects when the first connection cannot be made.
   */
  async start(): Promise<void> {
    log.info("Starting trading session");
    await this.catalog.load();
    await this.catalog.clearPortfolio();
    await this.supervisor.connect();
  }

  stop(): void {
    log.info("Stopping trading session");
    this.supervisor.stop();
  }

  /** Tear the connection down and bring everything back */
  reconnect(): Promise<void> {
    return this.supervisor.reconnect();
  }

  // ─── Status ───────────────────────────────────────────────

  isConnected(): boolean {
    return this.link.isConnected();
  }

  status(): SessionStatus {
    return {
      gatewayConnected: this.link.isConnected(),
      storeConnected: this.catalog.isOpen(),
      state: this.supervisor.state,
    };
  }

  getUniverses(): Universe[] {
    return this.catalog.list();
  }

  /** Look an instrument up across every loaded universe */
  findInstrument(conId: InstrumentKey): Instrument | undefined {
    for (const universe of this.catalog.list()) {
      const instrument = universe.find(conId);
      if (instrument) return instrument;
    }
    return undefined;
  }

  // ─── Commands ─────────────────────────────────────────────

  placeOrder(
    instrument: Instrument,
    action: OrderAction,
    notional: number,
    options: NotionalOrderOptions = {}
  ): Promise<PlacedOrder> {
    return placeNotionalOrder(this.link, instrument, action, notional, options);
  }

  cancelOrder(orderId: number): Trade {
    return cancelOwnedOrder(this.link, this.book, orderId);
  }

  /**
   * Cancel every open order at the gateway, including orders other clients
   * placed. The book learns the outcome from the order-event stream.
   */
  redButton(): void {
    if (!this.link.isConnected()) throw new NotConnectedError("redButton");
    log.warn(`Red button pressed (${this.book.open().length} working order(s) in the book)`);
    this.link.globalCancel();
  }
}
