/**
 * Subscription reconciler
 *
 * Brings local state back in line with the gateway after every (re)connect:
 * order events into the Book, positions and holdings into the Portfolio,
 * holdings into the "portfolio" universe, and one bar stream per holding.
 *
 * Every step checks before it acts, so running `reestablish()` again on a
 * healthy session changes nothing.
 */

import { EventEmitter } from "eventemitter3";
import { Subscription } from "rxjs";
import { componentLogger, describeError } from "../utils/logger.js";
import { InstrumentResolutionError } from "../types/errors.js";
import type { MarketDataMode } from "../config/index.js";
import type { GatewayLink } from "../types/gateway.js";
import type { ContractRef, Instrument, InstrumentKey } from "../types/market.js";
import type { PortfolioItem } from "../types/portfolio.js";
import type { Book } from "../trading/book.js";
import type { Portfolio } from "../trading/portfolio.js";
import type { InstrumentCatalog } from "../storage/instrument-catalog.js";
import type { MarketDataStreams, SubscriptionSpec } from "../api/ibkr/streams.js";
import type { Reestablisher } from "./connection-supervisor.js";

const log = componentLogger("reconciler");

export interface ReconcilerEvents {
  /** One holding could not be reconciled; the others carry on */
  itemError: (error: Error, item: PortfolioItem) => void;
}

export interface ReconcilerOptions {
  marketDataType: MarketDataMode;
  subscription: SubscriptionSpec;
}

export class SubscriptionReconciler extends EventEmitter<ReconcilerEvents> implements Reestablisher {
  private streams = new Subscription();
  private readonly inFlight = new Map<InstrumentKey, Promise<void>>();
  /** Identifies the current run; work started under an older run stops short */
  private run = 0;

  constructor(
    private readonly link: GatewayLink,
    private readonly book: Book,
    private readonly portfolio: Portfolio,
    private readonly catalog: InstrumentCatalog,
    private readonly marketData: MarketDataStreams,
    private readonly options: ReconcilerOptions
  ) {
    super();
  }

  /**
   * Re-subscribe every stream and reconcile holdings. The order-event
   * stream is attached before the open-orders snapshot is replayed.
   */
  async reestablish(): Promise<void> {
    const run = this.beginRun();
    log.info("Re-establishing subscriptions");

    this.streams.add(this.book.attach(this.link.orderEvents()));

    this.streams.add(
      this.link.positions().subscribe({
        next: (batch) => this.portfolio.updatePositions(batch),
        error: (err: unknown) => log.error(`Position stream failed: ${describeError(err)}`),
      })
    );

    this.streams.add(
      this.link.portfolioItems().subscribe({
        next: (item) => this.enqueue(item),
        error: (err: unknown) => log.error(`Portfolio stream failed: ${describeError(err)}`),
      })
    );

    // holdings the gateway already reported before we subscribed
    const snapshot = this.link.portfolioSnapshot();
    log.debug(`Replaying ${snapshot.length} portfolio item(s) from snapshot`);
    await Promise.all(snapshot.map((item) => this.handleItem(item)));
    if (run !== this.run) return;

    this.link.setMarketDataType(this.options.marketDataType);

    const orders = await this.link.openOrders();
    if (run !== this.run) return;
    for (const order of orders) this.book.recordOrder(order);

    log.info(
      `Subscriptions re-established: ${this.book.size} order(s), ` +
      `${this.marketData.size} bar stream(s)`
    );
  }

  /** Drop every stream subscription and bar stream; the link is gone */
  detach(): void {
    this.beginRun();
    this.marketData.closeAll();
    this.book.dropPending();
  }

  /**
   * Reconcile one holding against the portfolio universe and the open
   * bar streams. Concurrent calls for the same instrument share one run.
   * Never rejects; failures are reported through `itemError`.
   */
  reconcile(item: PortfolioItem): Promise<void> {
    const conId = item.contract.conId;
    const pending = this.inFlight.get(conId);
    if (pending) return pending;

    const run: Promise<void> = this.reconcileItem(item, this.run).finally(() => {
      if (this.inFlight.get(conId) === run) this.inFlight.delete(conId);
    });
    this.inFlight.set(conId, run);
    return run;
  }

  /** Resolves once no reconciliation is in flight */
  async settled(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight.values());
    }
  }

  // ─── Internals ────────────────────────────────────────────

  private beginRun(): number {
    this.run++;
    this.streams.unsubscribe();
    this.streams = new Subscription();
    this.inFlight.clear();
    return this.run;
  }

  private handleItem(item: PortfolioItem): Promise<void> {
    this.portfolio.updatePortfolioItem(item);
    return this.reconcile(item);
  }

  private enqueue(item: PortfolioItem): void {
    this.handleItem(item).catch((err: unknown) =>
      log.error(`Reconciling ${item.contract.symbol} failed: ${describeError(err)}`)
    );
  }

  private async reconcileItem(item: PortfolioItem, run: number): Promise<void> {
    const { contract } = item;
    try {
      const universe = await this.catalog.portfolio();
      let instrument = universe.find(contract.conId);
      if (!instrument) {
        instrument = await this.resolve(contract);
        await this.catalog.addToPortfolio(instrument);
        log.info(`Added ${instrument.symbol} (conId ${instrument.conId}) to portfolio universe`);
      }

      // a newer run owns the link now
      if (run !== this.run) return;
      if (!this.marketData.has(contract.conId)) {
        this.marketData.open(instrument, this.options.subscription);
      }
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      log.error(
        `Skipping ${contract.symbol} (conId ${contract.conId}, account ${item.account}): ` +
        describeError(error)
      );
      this.emit("itemError", error, item);
    }
  }

  private async resolve(contract: ContractRef): Promise<Instrument> {
    let matches: Instrument[];
    try {
      matches = await this.link.contractDetails(contract);
    } catch (err) {
      throw new InstrumentResolutionError(contract.conId, contract.symbol, describeError(err));
    }

    const [first] = matches;
    if (!first) {
      throw new InstrumentResolutionError(contract.conId, contract.symbol, "no contract details returned");
    }
    if (matches.length > 1) {
      log.debug(`${matches.length} matches for ${contract.symbol}, taking ${first.exchange}`);
    }
    return first;
  }
}
