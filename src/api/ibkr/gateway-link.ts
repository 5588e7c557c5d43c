/**
 * Interactive Brokers gateway link
 *
 * Wraps @stoqey/ib's IBApiNext behind the GatewayLink contract. The
 * library's own reconnect is switched off: reconnecting is the
 * ConnectionSupervisor's job, this class only reports what happened.
 *
 * Connection modes:
 *   - Port 7496: Live trading
 *   - Port 7497: Paper trading (default for development)
 */

import { EventEmitter } from "eventemitter3";
import { ConnectionState, IBApiNext } from "@stoqey/ib";
import { Observable, Subscription, filter, from, map, mergeMap } from "rxjs";
import { componentLogger } from "../../utils/logger.js";
import { gatewayDateTime, spanInDays } from "../../utils/time.js";
import { ConnectionRefusedError } from "../../types/errors.js";
import {
  isTerminal,
  normalizeOrderStatus,
  type Order,
  type OrderEvent,
  type OrderRequest,
  type OrderResult,
} from "../../types/orders.js";
import { holdingKey, type PortfolioItem, type PositionRecord } from "../../types/portfolio.js";
import type { MarketDataMode } from "../../config/index.js";
import type { GatewayLink, GatewayLinkEvents, TickerRequest } from "../../types/gateway.js";
import type { BarRequest, ContractRef, Instrument, PriceBar, Ticker } from "../../types/market.js";
import {
  toBarSizeSetting,
  toIbContract,
  toIbOrder,
  toIbWhatToShow,
  toInstruments,
  toMarketDataType,
  toOrderEvents,
  toOrders,
  toPortfolioItems,
  toPositionRecords,
  toPriceBar,
  toTicker,
} from "./mapping.js";

const log = componentLogger("ibkr");

/** TWS "Couldn't connect" */
const CONNECT_FAIL = 502;
/** TWS "Order rejected" */
const ORDER_REJECTED: number = 201;
/** Bars come back with epoch-second timestamps */
const FORMAT_EPOCH = 2;

export interface IbkrLinkOptions {
  host: string;
  port: number;
  clientId: number;
  connectTimeoutMs: number;
}

export class IbkrGatewayLink extends EventEmitter<GatewayLinkEvents> implements GatewayLink {
  readonly clientId: number;
  private readonly api: IBApiNext;
  private wasConnected = false;
  private stopRequested = false;
  private readonly holdings = new Map<string, PortfolioItem>();

  constructor(private readonly options: IbkrLinkOptions) {
    super();
    this.clientId = options.clientId;
    this.api = new IBApiNext({
      host: options.host,
      port: options.port,
      reconnectInterval: 0,
    });

    this.api.connectionState.subscribe((state) => this.onConnectionState(state));
    this.api.error.subscribe((apiError) => {
      const error = apiError.error;
      log.error(`IBKR API error ${apiError.code} (req ${apiError.reqId}): ${error.message}`);
      this.emit("error", error);
    });
  }

  isConnected(): boolean {
    return this.api.isConnected;
  }

  connect(): Promise<void> {
    if (this.api.isConnected) return Promise.resolve();

    const { host, port, connectTimeoutMs } = this.options;
    this.stopRequested = false;
    log.info(`Connecting to IBKR at ${host}:${port} (clientId: ${this.clientId})`);

    return new Promise<void>((resolve, reject) => {
      const watchers = new Subscription();
      let settled = false;

      const finish = (err?: Error) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        watchers.unsubscribe();
        if (!err) {
          resolve();
          return;
        }
        this.api.disconnect();
        reject(err);
      };

      const timer = setTimeout(
        () => finish(new ConnectionRefusedError(`No answer from ${host}:${port} within ${connectTimeoutMs}ms`)),
        connectTimeoutMs
      );

      watchers.add(
        this.api.connectionState.subscribe((state) => {
          if (state === ConnectionState.Connected) finish();
        })
      );
      watchers.add(
        this.api.error.subscribe((apiError) => {
          if (apiError.code === CONNECT_FAIL) {
            finish(new ConnectionRefusedError(apiError.error.message, apiError.code));
          }
        })
      );

      this.api.connect(this.clientId);
    });
  }

  disconnect(): void {
    this.stopRequested = true;
    this.api.disconnect();
  }

  // ─── Streams ──────────────────────────────────────────────

  positions(): Observable<PositionRecord[]> {
    return this.api.getPositions().pipe(map((update) => toPositionRecords(update)));
  }

  portfolioItems(): Observable<PortfolioItem> {
    return this.api
      .getAccountUpdates()
      .pipe(mergeMap((update) => this.changedHoldings(toPortfolioItems(update))));
  }

  orderEvents(): Observable<OrderEvent> {
    return this.api
      .getOpenOrders()
      .pipe(mergeMap((update) => toOrderEvents(update)));
  }

  contractTicks(contract: ContractRef, request: TickerRequest): Observable<Ticker> {
    const ibContract = toIbContract(contract);
    if (request.snapshot) {
      return from(this.api.getMarketDataSnapshot(ibContract, "", false)).pipe(
        map((ticks) => toTicker(contract.conId, ticks))
      );
    }
    return this.api
      .getMarketData(ibContract, "", false, false)
      .pipe(map((update) => toTicker(contract.conId, update.all)));
  }

  historicalBars(contract: ContractRef, request: BarRequest): Observable<PriceBar> {
    return new Observable<PriceBar>((subscriber) => {
      const ibContract = toIbContract(contract);
      const barSize = toBarSizeSetting(request.barSize);
      const whatToShow = toIbWhatToShow(request.whatToShow);
      const { start, end, timezone } = request.range;
      let live: Subscription | null = null;
      let closed = false;

      this.api
        .getHistoricalData(
          ibContract,
          gatewayDateTime(end, timezone),
          `${spanInDays(start, end)} D`,
          barSize,
          whatToShow,
          0,
          FORMAT_EPOCH
        )
        .then((rows) => {
          if (closed) return;
          for (const row of rows) {
            const bar = toPriceBar(row);
            if (bar && bar.timestamp >= start) subscriber.next(bar);
          }
          live = this.api
            .getHistoricalDataUpdates(ibContract, barSize, whatToShow, FORMAT_EPOCH)
            .pipe(
              map((row) => toPriceBar(row)),
              filter((bar): bar is PriceBar => bar !== null)
            )
            .subscribe(subscriber);
        })
        .catch((err: unknown) => subscriber.error(toError(err)));

      return () => {
        closed = true;
        live?.unsubscribe();
      };
    });
  }

  // ─── Snapshots ────────────────────────────────────────────

  portfolioSnapshot(): PortfolioItem[] {
    return Array.from(this.holdings.values());
  }

  async openOrders(): Promise<Order[]> {
    const rows = await this.api.getAllOpenOrders();
    return toOrders(rows);
  }

  async contractDetails(contract: ContractRef): Promise<Instrument[]> {
    const rows = await this.api.getContractDetails(toIbContract(contract));
    return toInstruments(rows);
  }

  // ─── Commands ─────────────────────────────────────────────

  placeOrder(contract: ContractRef, request: OrderRequest): Observable<OrderResult> {
    return new Observable<OrderResult>((subscriber) => {
      const watchers = new Subscription();
      const backlog: OrderEvent[] = [];
      let orderId: number | null = null;
      let lastReported = "";

      const report = (result: OrderResult) => {
        const signature = `${result.rawStatus}:${result.filled}`;
        if (signature === lastReported) return;
        lastReported = signature;
        subscriber.next(result);
        if (isTerminal(result.status)) subscriber.complete();
      };

      const onEvent = (id: number, event: OrderEvent) => {
        if (event.type === "status" && event.orderId === id) {
          report({
            orderId: id,
            status: normalizeOrderStatus(event.rawStatus) ?? "unknown",
            rawStatus: event.rawStatus,
            filled: event.filled,
            remaining: event.remaining,
            avgFillPrice: event.avgFillPrice,
          });
        }
      };

      watchers.add(
        this.orderEvents().subscribe({
          next: (event) => (orderId === null ? backlog.push(event) : onEvent(orderId, event)),
          error: (err: unknown) => subscriber.error(toError(err)),
        })
      );
      watchers.add(
        this.api.error.subscribe((apiError) => {
          if (orderId === null || apiError.reqId !== orderId || apiError.code !== ORDER_REJECTED) return;
          report({
            orderId,
            status: "rejected",
            rawStatus: "Rejected",
            filled: 0,
            remaining: request.quantity,
            avgFillPrice: 0,
          });
        })
      );

      this.api
        .placeNewOrder(toIbContract(contract), toIbOrder(request))
        .then((id) => {
          orderId = id;
          log.info(
            `Order ${id} placed: ${request.action} ${request.quantity}x ${contract.symbol} ` +
            `${request.orderType}${request.limitPrice !== undefined ? ` @ ${request.limitPrice}` : ""}`
          );
          report({
            orderId: id,
            status: "submitted",
            rawStatus: "ApiPending",
            filled: 0,
            remaining: request.quantity,
            avgFillPrice: 0,
          });
          for (const event of backlog.splice(0)) onEvent(id, event);
        })
        .catch((err: unknown) => subscriber.error(toError(err)));

      return () => watchers.unsubscribe();
    });
  }

  cancelOrder(orderId: number): void {
    log.info(`Cancelling order ${orderId}`);
    this.api.cancelOrder(orderId);
  }

  setMarketDataType(mode: MarketDataMode): void {
    log.info(`Market data type: ${mode}`);
    this.api.setMarketDataType(toMarketDataType(mode));
  }

  globalCancel(): void {
    log.warn("Global cancel requested");
    this.api.cancelAllOrders();
  }

  // ─── Internals ────────────────────────────────────────────

  private onConnectionState(state: ConnectionState): void {
    if (state === ConnectionState.Connected && !this.wasConnected) {
      this.wasConnected = true;
      log.info("Connected to IBKR");
      this.emit("connected");
      return;
    }

    if (state === ConnectionState.Disconnected && this.wasConnected) {
      this.wasConnected = false;
      this.holdings.clear();
      const reason = this.stopRequested ? "requested" : "connection_lost";
      log.warn(`Disconnected from IBKR (${reason})`);
      this.emit("disconnected", reason);
    }
  }

  /**
   * Account updates repeat the whole portfolio every time. Pass on only
   * rows that changed, and a zero-quantity row for each holding that
   * disappeared from its account.
   */
  private changedHoldings(items: PortfolioItem[]): PortfolioItem[] {
    const seen = new Set<string>();
    const accounts = new Set<string>();
    const changed: PortfolioItem[] = [];

    for (const item of items) {
      const key = holdingKey(item.account, item.contract.conId);
      seen.add(key);
      accounts.add(item.account);
      const previous = this.holdings.get(key);
      if (previous && sameHolding(previous, item)) continue;
      this.holdings.set(key, item);
      changed.push(item);
    }

    for (const [key, previous] of this.holdings) {
      if (seen.has(key) || !accounts.has(previous.account)) continue;
      this.holdings.delete(key);
      changed.push({ ...previous, quantity: 0, marketValue: 0, unrealizedPnL: 0 });
    }
    return changed;
  }
}

function sameHolding(a: PortfolioItem, b: PortfolioItem): boolean {
  return (
    a.quantity === b.quantity &&
    a.marketPrice === b.marketPrice &&
    a.marketValue === b.marketValue &&
    a.averageCost === b.averageCost &&
    a.unrealizedPnL === b.unrealizedPnL &&
    a.realizedPnL === b.realizedPnL
  );
}

/** The library rejects with { error, code, reqId } records rather than Errors */
function toError(err: unknown): Error {
  if (err instanceof Error) return err;
  if (typeof err === "object" && err !== null && "error" in err && err.error instanceof Error) {
    return err.error;
  }
  return new Error(String(err));
}
