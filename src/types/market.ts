/**
 * Instrument and market data type definitions.
 */

/** Stable instrument key: the gateway's contract id */
export type InstrumentKey = number;

/** Raw contract reference as the gateway reports it on positions and orders */
export interface ContractRef {
  conId: InstrumentKey;
  symbol: string;
  secType: string;
  exchange?: string;
  primaryExchange?: string;
  currency?: string;
  localSymbol?: string;
}

/** Fully resolved, immutable instrument definition */
export interface Instrument {
  readonly conId: InstrumentKey;
  readonly symbol: string;
  readonly secType: string;
  readonly exchange: string;
  readonly primaryExchange?: string;
  readonly currency: string;
  readonly longName?: string;
  /** IANA zone of the listing exchange, e.g. "America/New_York" */
  readonly timeZoneId?: string;
  readonly minTick?: number;
}

/** Point-in-time price snapshot for one contract */
export interface Ticker {
  conId: InstrumentKey;
  bid?: number;
  ask?: number;
  last?: number;
  close?: number;
  time: Date;
}

/** Historical or live price bar */
export interface PriceBar {
  timestamp: Date;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export type BarSize = "1 min" | "5 mins" | "15 mins" | "1 hour" | "1 day";

export type WhatToShow = "TRADES" | "MIDPOINT" | "BID" | "ASK";

/** Date range for a bar request, with the zone it was stamped in */
export interface DateRange {
  start: Date;
  end: Date;
  timezone: string;
}

/** Historical backfill followed by live updates */
export interface BarRequest {
  range: DateRange;
  barSize: BarSize;
  whatToShow: WhatToShow;
}

export function contractFromInstrument(instrument: Instrument): ContractRef {
  return {
    conId: instrument.conId,
    symbol: instrument.symbol,
    secType: instrument.secType,
    exchange: instrument.exchange,
    primaryExchange: instrument.primaryExchange,
    currency: instrument.currency,
  };
}
