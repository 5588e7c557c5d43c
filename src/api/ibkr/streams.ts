/**
 * Market data subscriptions for holdings.
 *
 * One historical+live bar stream per instrument, keyed by conId. Bars are
 * handed to a BarSink (the tick store in production, an in-memory series
 * by default).
 */

import type { Subscription } from "rxjs";
import { componentLogger, describeError } from "../../utils/logger.js";
import { contractFromInstrument } from "../../types/market.js";
import type { GatewayLink } from "../../types/gateway.js";
import type {
  BarRequest,
  BarSize,
  DateRange,
  Instrument,
  InstrumentKey,
  PriceBar,
  WhatToShow,
} from "../../types/market.js";

const log = componentLogger("ibkr-streams");

/** Receives bars for one subscription */
export interface BarSink {
  write(bar: PriceBar): void;
  fail?(err: unknown): void;
}

/** In-memory bar series, the default sink */
export class BarSeries implements BarSink {
  private readonly bars: PriceBar[] = [];
  private failure: unknown = null;

  write(bar: PriceBar): void {
    const last = this.bars[this.bars.length - 1];
    // live updates re-send the forming bar; replace instead of appending
    if (last && last.timestamp.getTime() === bar.timestamp.getTime()) {
      this.bars[this.bars.length - 1] = bar;
      return;
    }
    this.bars.push(bar);
  }

  fail(err: unknown): void {
    this.failure = err;
  }

  get length(): number {
    return this.bars.length;
  }

  get lastError(): unknown {
    return this.failure;
  }

  latest(): PriceBar | undefined {
    return this.bars[this.bars.length - 1];
  }

  toArray(): PriceBar[] {
    return [...this.bars];
  }
}

export interface MarketDataSubscription {
  instrument: Instrument;
  request: BarRequest;
  sink: BarSink;
  openedAt: Date;
}

export type BarSinkFactory = (instrument: Instrument) => BarSink;

export interface SubscriptionSpec {
  historyDays: number;
  barSize: BarSize;
  whatToShow: WhatToShow;
  /** Zone used when the instrument does not carry one */
  defaultTimezone: string;
}

export class MarketDataStreams {
  private readonly active = new Map<
    InstrumentKey,
    { subscription: MarketDataSubscription; handle: Subscription }
  >();

  constructor(
    private readonly link: GatewayLink,
    private readonly sinkFactory: BarSinkFactory = () => new BarSeries()
  ) {}

  has(conId: InstrumentKey): boolean {
    return this.active.has(conId);
  }

  get(conId: InstrumentKey): MarketDataSubscription | undefined {
    return this.active.get(conId)?.subscription;
  }

  /**
   * Open a bar stream for the instrument unless one exists already.
   * Returns the (possibly existing) subscription.
   */
  open(instrument: Instrument, spec: SubscriptionSpec, now: Date = new Date()): MarketDataSubscription {
    const existing = this.active.get(instrument.conId);
    if (existing) {
      log.debug(`Already streaming ${instrument.symbol} bars`);
      return existing.subscription;
    }

    const request: BarRequest = {
      range: trailingRange(spec.historyDays, instrument.timeZoneId ?? spec.defaultTimezone, now),
      barSize: spec.barSize,
      whatToShow: spec.whatToShow,
    };
    const sink = this.sinkFactory(instrument);
    const subscription: MarketDataSubscription = { instrument, request, sink, openedAt: now };

    log.info(
      `Subscribing to ${instrument.symbol} ${request.barSize} ${request.whatToShow} bars ` +
      `from ${request.range.start.toISOString()} (${request.range.timezone})`
    );

    const handle = this.link
      .historicalBars(contractFromInstrument(instrument), request)
      .subscribe({
        next: (bar) => sink.write(bar),
        error: (err: unknown) => {
          log.error(`Bar stream for ${instrument.symbol} (conId ${instrument.conId}) failed: ${describeError(err)}`);
          sink.fail?.(err);
          this.active.delete(instrument.conId);
        },
      });

    // an Observable that errors synchronously has already removed itself
    if (!handle.closed) {
      this.active.set(instrument.conId, { subscription, handle });
    }
    return subscription;
  }

  close(conId: InstrumentKey): boolean {
    const entry = this.active.get(conId);
    if (!entry) return false;
    entry.handle.unsubscribe();
    this.active.delete(conId);
    return true;
  }

  /** Unsubscribe from all bar streams */
  closeAll(): void {
    log.info(`Closing ${this.active.size} bar stream(s)`);
    for (const entry of this.active.values()) {
      entry.handle.unsubscribe();
    }
    this.active.clear();
  }

  get size(): number {
    return this.active.size;
  }

  subscriptions(): MarketDataSubscription[] {
    return Array.from(this.active.values(), (entry) => entry.subscription);
  }
}

/**
 * Date range covering the trailing `days` up to `now`, stamped in the
 * exchange's time zone.
 */
export function trailingRange(days: number, timezone: string, now: Date = new Date()): DateRange {
  const start = new Date(now.getTime() - days * 24 * 60 * 60 * 1000);
  return { start, end: now, timezone };
}
