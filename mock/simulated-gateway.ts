/**
 * Simulated Gateway
 *
 * An in-process GatewayLink for tests and local development. Streams are
 * rxjs Subjects the caller pushes into; every call the session makes is
 * appended to `calls`, so tests can assert on ordering and on the absence
 * of gateway traffic.
 */

import { EventEmitter } from "eventemitter3";
import { Observable, Subject, of, throwError } from "rxjs";
import { ConnectionRefusedError } from "../src/types/errors.js";
import {
  isTerminal,
  normalizeOrderStatus,
  type Order,
  type OrderEvent,
  type OrderRequest,
  type OrderResult,
} from "../src/types/orders.js";
import type { MarketDataMode } from "../src/config/index.js";
import type { GatewayLink, GatewayLinkEvents, TickerRequest } from "../src/types/gateway.js";
import type {
  BarRequest,
  ContractRef,
  Instrument,
  InstrumentKey,
  PriceBar,
  Ticker,
} from "../src/types/market.js";
import type { PortfolioItem, PositionRecord } from "../src/types/portfolio.js";

export interface SimulatedGatewayOptions {
  clientId?: number;
  /** Connect attempts to refuse before accepting */
  refusals?: number;
}

export class SimulatedGateway extends EventEmitter<GatewayLinkEvents> implements GatewayLink {
  readonly clientId: number;
  readonly calls: string[] = [];

  private connected = false;
  private refusalsLeft: number;
  private connectFailure: Error | null = null;

  private readonly positions$ = new Subject<PositionRecord[]>();
  private readonly portfolio$ = new Subject<PortfolioItem>();
  private readonly orderEvents$ = new Subject<OrderEvent>();
  private readonly bars = new Map<InstrumentKey, Subject<PriceBar>>();
  private readonly orderResults = new Map<number, Subject<OrderResult>>();

  private readonly details = new Map<InstrumentKey, Instrument>();
  private readonly detailFailures = new Set<InstrumentKey>();
  private readonly tickers = new Map<InstrumentKey, Ticker>();
  private snapshot: PortfolioItem[] = [];
  private open: Order[] = [];
  private nextOrderId = 1;

  constructor(options: SimulatedGatewayOptions = {}) {
    super();
    this.clientId = options.clientId ?? 1;
    this.refusalsLeft = options.refusals ?? 0;
  }

  // ─── Scripting ────────────────────────────────────────────

  refuseConnections(count: number): void {
    this.refusalsLeft = count;
  }

  /** Make every connect attempt fail with a non-retryable error */
  failConnectWith(err: Error | null): void {
    this.connectFailure = err;
  }

  addInstrument(instrument: Instrument): void {
    this.details.set(instrument.conId, instrument);
  }

  failResolution(conId: InstrumentKey): void {
    this.detailFailures.add(conId);
  }

  setTicker(ticker: Ticker): void {
    this.tickers.set(ticker.conId, ticker);
  }

  setPortfolioSnapshot(items: PortfolioItem[]): void {
    this.snapshot = items;
  }

  setOpenOrders(orders: Order[]): void {
    this.open = orders;
  }

  pushPositions(batch: PositionRecord[]): void {
    this.positions$.next(batch);
  }

  pushPortfolioItem(item: PortfolioItem): void {
    this.portfolio$.next(item);
  }

  pushOrderEvent(event: OrderEvent): void {
    this.orderEvents$.next(event);
  }

  pushBar(conId: InstrumentKey, bar: PriceBar): void {
    this.bars.get(conId)?.next(bar);
  }

  failBarStream(conId: InstrumentKey, err: Error): void {
    const subject = this.bars.get(conId);
    this.bars.delete(conId);
    subject?.error(err);
  }

  /** Report a status for an order placed through this gateway */
  reportOrderStatus(orderId: number, rawStatus: string, filled: number, remaining: number, avgFillPrice = 0): void {
    this.orderEvents$.next({ type: "status", orderId, rawStatus, filled, remaining, avgFillPrice });
    const results = this.orderResults.get(orderId);
    if (!results) return;
    const status = normalizeOrderStatus(rawStatus) ?? "unknown";
    results.next({ orderId, status, rawStatus, filled, remaining, avgFillPrice });
    if (isTerminal(status)) results.complete();
  }

  /** Drop the connection as if the gateway went away */
  dropConnection(reason = "connection_lost"): void {
    if (!this.connected) return;
    this.connected = false;
    this.emit("disconnected", reason);
  }

  /** Bring the connection back without being asked */
  recover(): void {
    if (this.connected) return;
    this.connected = true;
    this.emit("connected");
  }

  /** Number of bar streams currently subscribed */
  openBarStreams(): number {
    let count = 0;
    for (const subject of this.bars.values()) {
      if (subject.observed) count++;
    }
    return count;
  }

  count(call: string): number {
    return this.calls.filter((entry) => entry === call).length;
  }

  // ─── GatewayLink ──────────────────────────────────────────

  isConnected(): boolean {
    return this.connected;
  }

  async connect(): Promise<void> {
    this.calls.push("connect");
    if (this.connectFailure) throw this.connectFailure;
    if (this.refusalsLeft > 0) {
      this.refusalsLeft--;
      throw new ConnectionRefusedError("Connection refused", 502);
    }
    this.connected = true;
    this.emit("connected");
  }

  disconnect(): void {
    this.calls.push("disconnect");
    this.dropConnection("requested");
  }

  positions(): Observable<PositionRecord[]> {
    this.calls.push("positions");
    return this.positions$.asObservable();
  }

  portfolioItems(): Observable<PortfolioItem> {
    this.calls.push("portfolioItems");
    return this.portfolio$.asObservable();
  }

  orderEvents(): Observable<OrderEvent> {
    this.calls.push("orderEvents");
    return this.orderEvents$.asObservable();
  }

  contractTicks(contract: ContractRef, request: TickerRequest): Observable<Ticker> {
    this.calls.push(`contractTicks:${contract.conId}${request.snapshot ? ":snapshot" : ""}`);
    const ticker = this.tickers.get(contract.conId);
    if (!ticker) return throwError(() => new Error(`No market data for conId ${contract.conId}`));
    return of(ticker);
  }

  historicalBars(contract: ContractRef, _request: BarRequest): Observable<PriceBar> {
    this.calls.push(`historicalBars:${contract.conId}`);
    let subject = this.bars.get(contract.conId);
    if (!subject) {
      subject = new Subject<PriceBar>();
      this.bars.set(contract.conId, subject);
    }
    return subject.asObservable();
  }

  portfolioSnapshot(): PortfolioItem[] {
    this.calls.push("portfolioSnapshot");
    return [...this.snapshot];
  }

  async openOrders(): Promise<Order[]> {
    this.calls.push("openOrders");
    return this.open.map((order) => ({ ...order }));
  }

  async contractDetails(contract: ContractRef): Promise<Instrument[]> {
    this.calls.push(`contractDetails:${contract.conId}`);
    if (this.detailFailures.has(contract.conId)) {
      throw new Error(`No security definition for conId ${contract.conId}`);
    }
    const instrument = this.details.get(contract.conId);
    return instrument ? [instrument] : [];
  }

  placeOrder(contract: ContractRef, request: OrderRequest): Observable<OrderResult> {
    const orderId = this.nextOrderId++;
    this.calls.push(`placeOrder:${orderId}`);

    const order: Order = {
      orderId,
      clientId: this.clientId,
      contract,
      action: request.action,
      quantity: request.quantity,
      orderType: request.orderType,
      limitPrice: request.limitPrice,
      status: "submitted",
    };
    this.open.push(order);

    const results = new Subject<OrderResult>();
    this.orderResults.set(orderId, results);

    return new Observable<OrderResult>((subscriber) => {
      subscriber.next({
        orderId,
        status: "submitted",
        rawStatus: "ApiPending",
        filled: 0,
        remaining: request.quantity,
        avgFillPrice: 0,
      });
      this.orderEvents$.next({ type: "open", order: { ...order }, rawStatus: "PendingSubmit" });
      return results.subscribe(subscriber);
    });
  }

  cancelOrder(orderId: number): void {
    this.calls.push(`cancelOrder:${orderId}`);
  }

  setMarketDataType(mode: MarketDataMode): void {
    this.calls.push(`setMarketDataType:${mode}`);
  }

  globalCancel(): void {
    this.calls.push("globalCancel");
    for (const order of this.open) {
      if (isTerminal(order.status)) continue;
      order.status = "cancelled";
      this.orderEvents$.next({ type: "cancel", orderId: order.orderId, message: "global cancel" });
    }
  }
}
