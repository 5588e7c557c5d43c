/**
 * Translation between @stoqey/ib rows and the session's own types.
 *
 * Library rows are parsed with zod rather than trusted: fields the gateway
 * leaves out come back undefined. Batches are parsed row by row, so one
 * malformed row is logged and skipped while the rest of the batch goes on.
 */

import { z } from "zod";
import { componentLogger } from "../../utils/logger.js";
import {
  BarSizeSetting,
  IBApiTickType,
  MarketDataType,
  OrderAction as IbOrderAction,
  OrderType as IbOrderType,
  SecType,
  WhatToShow as IbWhatToShow,
  type Contract as IbContract,
  type Order as IbOrder,
} from "@stoqey/ib";
import type { MarketDataMode } from "../../config/index.js";
import type {
  BarSize,
  ContractRef,
  Instrument,
  PriceBar,
  Ticker,
  WhatToShow,
} from "../../types/market.js";
import {
  UNKNOWN_CLIENT_ID,
  normalizeOrderStatus,
  type Order,
  type OrderEvent,
  type OrderRequest,
} from "../../types/orders.js";
import type { PortfolioItem, PositionRecord } from "../../types/portfolio.js";

const log = componentLogger("ibkr-mapping");

// ── Row schemas ─────────────────────────────────────────────

const ContractRow = z.object({
  conId: z.number().optional(),
  symbol: z.string().optional(),
  secType: z.string().optional(),
  exchange: z.string().optional(),
  primaryExch: z.string().optional(),
  currency: z.string().optional(),
  localSymbol: z.string().optional(),
});

const PositionRow = z.object({
  account: z.string(),
  contract: ContractRow,
  pos: z.number(),
  avgCost: z.number().optional(),
  marketPrice: z.number().optional(),
  marketValue: z.number().optional(),
  unrealizedPNL: z.number().optional(),
  realizedPNL: z.number().optional(),
});

type PositionRow = z.infer<typeof PositionRow>;

// containers only; rows are checked one at a time
const PositionsUpdate = z.object({
  all: z.map(z.string(), z.array(z.unknown())),
});

const AccountUpdate = z.object({
  all: z.object({
    portfolio: z.map(z.string(), z.array(z.unknown())).optional(),
  }),
});

const OpenOrderRow = z.object({
  orderId: z.number(),
  contract: ContractRow,
  order: z.object({
    clientId: z.number().optional(),
    permId: z.number().optional(),
    action: z.string().optional(),
    totalQuantity: z.number().optional(),
    orderType: z.string().optional(),
    lmtPrice: z.number().optional(),
  }),
  orderState: z.object({ status: z.string().optional() }).optional(),
  orderStatus: z
    .object({
      status: z.string(),
      filled: z.number().optional(),
      remaining: z.number().optional(),
      avgFillPrice: z.number().optional(),
      clientId: z.number().optional(),
      whyHeld: z.string().optional(),
    })
    .optional(),
});

type OpenOrderRow = z.infer<typeof OpenOrderRow>;

const OpenOrdersUpdate = z.object({
  added: z.array(z.unknown()).optional(),
  changed: z.array(z.unknown()).optional(),
});

/** Just enough of a row to name it in a log line */
const RowIdentity = z.object({
  orderId: z.number().optional(),
  contract: z.object({ conId: z.number().optional(), symbol: z.string().optional() }).optional(),
});

const ContractDetailsRow = z.object({
  contract: ContractRow,
  longName: z.string().optional(),
  timeZoneId: z.string().optional(),
  minTick: z.number().optional(),
});

const BarRow = z.object({
  time: z.string().optional(),
  open: z.number().optional(),
  high: z.number().optional(),
  low: z.number().optional(),
  close: z.number().optional(),
  volume: z.number().optional(),
});

// ── Gateway → session ───────────────────────────────────────

export function toContractRef(row: z.infer<typeof ContractRow>): ContractRef | null {
  if (row.conId === undefined || !row.symbol) return null;
  return {
    conId: row.conId,
    symbol: row.symbol,
    secType: row.secType ?? "STK",
    exchange: row.exchange || undefined,
    primaryExchange: row.primaryExch || undefined,
    currency: row.currency || undefined,
    localSymbol: row.localSymbol || undefined,
  };
}

function describeRow(row: unknown): string {
  const identity = RowIdentity.safeParse(row);
  if (!identity.success) return "unidentified row";
  const { orderId, contract } = identity.data;
  const parts: string[] = [];
  if (orderId !== undefined) parts.push(`order ${orderId}`);
  if (contract?.symbol) parts.push(contract.symbol);
  if (contract?.conId !== undefined) parts.push(`conId ${contract.conId}`);
  return parts.length > 0 ? parts.join(" ") : "unidentified row";
}

/** Parse each row on its own; rows that fail are logged and left out */
function parseRows<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, rows: readonly unknown[], kind: string): T[] {
  const parsed: T[] = [];
  for (const row of rows) {
    const result = schema.safeParse(row);
    if (result.success) {
      parsed.push(result.data);
      continue;
    }
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    log.warn(`Skipping malformed ${kind} row (${describeRow(row)}): ${issues}`);
  }
  return parsed;
}

function withContract(row: PositionRow, kind: string): ContractRef | null {
  const contract = toContractRef(row.contract);
  if (!contract) log.warn(`Skipping ${kind} row without a contract id (account ${row.account})`);
  return contract;
}

/** Flatten a positions update (account → rows) into records */
export function toPositionRecords(update: unknown): PositionRecord[] {
  const parsed = PositionsUpdate.safeParse(update);
  if (!parsed.success) {
    log.warn("Ignoring positions update of unexpected shape");
    return [];
  }

  const records: PositionRecord[] = [];
  for (const [account, rows] of parsed.data.all) {
    for (const row of parseRows(PositionRow, rows, "position")) {
      const contract = withContract(row, "position");
      if (!contract) continue;
      records.push({
        account: row.account || account,
        contract,
        quantity: row.pos,
        averageCost: row.avgCost ?? 0,
      });
    }
  }
  return records;
}

/** Portfolio rows carried by an account-updates snapshot */
export function toPortfolioItems(update: unknown): PortfolioItem[] {
  const parsed = AccountUpdate.safeParse(update);
  if (!parsed.success) {
    log.warn("Ignoring account update of unexpected shape");
    return [];
  }
  if (!parsed.data.all.portfolio) return [];

  const items: PortfolioItem[] = [];
  for (const [account, rows] of parsed.data.all.portfolio) {
    for (const row of parseRows(PositionRow, rows, "portfolio")) {
      const contract = withContract(row, "portfolio");
      if (!contract) continue;
      items.push({
        account: row.account || account,
        contract,
        quantity: row.pos,
        marketPrice: row.marketPrice ?? 0,
        marketValue: row.marketValue ?? 0,
        averageCost: row.avgCost ?? 0,
        unrealizedPnL: row.unrealizedPNL ?? 0,
        realizedPnL: row.realizedPNL ?? 0,
      });
    }
  }
  return items;
}

/**
 * Order from an open-order row. An owner the gateway did not report is
 * booked as UNKNOWN_CLIENT_ID, which no session can cancel.
 */
export function toOrder(row: OpenOrderRow): Order | null {
  const contract = toContractRef(row.contract);
  const action = row.order.action;
  if (!contract || (action !== "BUY" && action !== "SELL")) {
    log.warn(`Skipping order ${row.orderId}: missing contract id or side "${action ?? ""}"`);
    return null;
  }

  const clientId = row.order.clientId ?? row.orderStatus?.clientId;
  if (clientId === undefined) {
    log.warn(`Order ${row.orderId} (${contract.symbol}) has no reported owner; it cannot be cancelled here`);
  }

  const rawStatus = row.orderStatus?.status ?? row.orderState?.status ?? "PendingSubmit";
  return {
    orderId: row.orderId,
    clientId: clientId ?? UNKNOWN_CLIENT_ID,
    permId: row.order.permId,
    contract,
    action,
    quantity: row.order.totalQuantity ?? 0,
    orderType: row.order.orderType === "MKT" ? "MKT" : "LMT",
    limitPrice: row.order.lmtPrice,
    status: normalizeOrderStatus(rawStatus) ?? "submitted",
  };
}

/** Open orders from the gateway's authoritative snapshot */
export function toOrders(rows: unknown): Order[] {
  if (!Array.isArray(rows)) {
    log.warn("Ignoring open-orders snapshot of unexpected shape");
    return [];
  }
  return parseRows(OpenOrderRow, rows, "open order").flatMap((row) => toOrder(row) ?? []);
}

/** Lifecycle events for the rows an open-orders update added or changed */
export function toOrderEvents(update: unknown): OrderEvent[] {
  const parsed = OpenOrdersUpdate.safeParse(update);
  if (!parsed.success) {
    log.warn("Ignoring open-orders update of unexpected shape");
    return [];
  }

  const rows = parseRows(
    OpenOrderRow,
    [...(parsed.data.added ?? []), ...(parsed.data.changed ?? [])],
    "open order"
  );
  const events: OrderEvent[] = [];
  for (const row of rows) {
    const order = toOrder(row);
    if (!order) continue;
    const status = row.orderStatus;
    events.push({ type: "open", order, rawStatus: status?.status ?? row.orderState?.status ?? "PendingSubmit" });
    if (status) {
      events.push({
        type: "status",
        orderId: row.orderId,
        rawStatus: status.status,
        filled: status.filled ?? 0,
        remaining: status.remaining ?? order.quantity,
        avgFillPrice: status.avgFillPrice ?? 0,
        clientId: status.clientId,
        whyHeld: status.whyHeld || undefined,
      });
    }
  }
  return events;
}

export function toInstruments(rows: unknown): Instrument[] {
  const parsed = z.array(ContractDetailsRow).safeParse(rows);
  if (!parsed.success) return [];

  return parsed.data.flatMap((row) => {
    const contract = toContractRef(row.contract);
    if (!contract) return [];
    const instrument: Instrument = {
      conId: contract.conId,
      symbol: contract.symbol,
      secType: contract.secType,
      exchange: contract.exchange ?? "SMART",
      primaryExchange: contract.primaryExchange,
      currency: contract.currency ?? "USD",
      longName: row.longName || undefined,
      timeZoneId: row.timeZoneId || undefined,
      minTick: row.minTick,
    };
    return [instrument];
  });
}

/** Bar with a "time" in epoch seconds, or YYYYMMDD for daily bars */
export function toPriceBar(row: unknown): PriceBar | null {
  const parsed = BarRow.safeParse(row);
  if (!parsed.success || !parsed.data.time) return null;
  const bar = parsed.data;

  const timestamp = parseBarTime(bar.time ?? "");
  if (!timestamp || bar.close === undefined) return null;
  return {
    timestamp,
    open: bar.open ?? bar.close,
    high: bar.high ?? bar.close,
    low: bar.low ?? bar.close,
    close: bar.close,
    volume: bar.volume ?? 0,
  };
}

function parseBarTime(time: string): Date | null {
  const trimmed = time.trim();
  const daily = /^(\d{4})(\d{2})(\d{2})$/.exec(trimmed);
  if (daily) {
    return new Date(Date.UTC(Number(daily[1]), Number(daily[2]) - 1, Number(daily[3])));
  }
  const seconds = Number(trimmed);
  return Number.isFinite(seconds) && trimmed !== "" ? new Date(seconds * 1000) : null;
}

const tickValue = (
  ticks: ReadonlyMap<number, { value?: number }>,
  live: number,
  delayed: number
): number | undefined => {
  for (const tickType of [live, delayed]) {
    const value = ticks.get(tickType)?.value;
    // the gateway reports -1 for "no price"
    if (typeof value === "number" && Number.isFinite(value) && value > 0) return value;
  }
  return undefined;
};

/** Ticker from a tick map; delayed ticks stand in for missing live ones */
export function toTicker(conId: number, ticks: ReadonlyMap<number, { value?: number }>): Ticker {
  return {
    conId,
    bid: tickValue(ticks, IBApiTickType.BID, IBApiTickType.DELAYED_BID),
    ask: tickValue(ticks, IBApiTickType.ASK, IBApiTickType.DELAYED_ASK),
    last: tickValue(ticks, IBApiTickType.LAST, IBApiTickType.DELAYED_LAST),
    close: tickValue(ticks, IBApiTickType.CLOSE, IBApiTickType.DELAYED_CLOSE),
    time: new Date(),
  };
}

// ── Session → gateway ───────────────────────────────────────

function isSecType(value: string): value is SecType {
  return Object.values<string>(SecType).includes(value);
}

export function toIbContract(contract: ContractRef): IbContract {
  return {
    conId: contract.conId,
    symbol: contract.symbol,
    secType: isSecType(contract.secType) ? contract.secType : SecType.STK,
    exchange: contract.exchange ?? "SMART",
    primaryExch: contract.primaryExchange,
    currency: contract.currency ?? "USD",
  };
}

export function toIbOrder(request: OrderRequest): IbOrder {
  return {
    action: request.action === "BUY" ? IbOrderAction.BUY : IbOrderAction.SELL,
    totalQuantity: request.quantity,
    orderType: request.orderType === "MKT" ? IbOrderType.MKT : IbOrderType.LMT,
    lmtPrice: request.orderType === "LMT" ? request.limitPrice : undefined,
    transmit: true,
  };
}

const BAR_SIZES: Record<BarSize, BarSizeSetting> = {
  "1 min": BarSizeSetting.MINUTES_ONE,
  "5 mins": BarSizeSetting.MINUTES_FIVE,
  "15 mins": BarSizeSetting.MINUTES_FIFTEEN,
  "1 hour": BarSizeSetting.HOURS_ONE,
  "1 day": BarSizeSetting.DAYS_ONE,
};

const WHAT_TO_SHOW: Record<WhatToShow, IbWhatToShow> = {
  TRADES: IbWhatToShow.TRADES,
  MIDPOINT: IbWhatToShow.MIDPOINT,
  BID: IbWhatToShow.BID,
  ASK: IbWhatToShow.ASK,
};

const MARKET_DATA_TYPES: Record<MarketDataMode, MarketDataType> = {
  live: MarketDataType.REALTIME,
  frozen: MarketDataType.FROZEN,
  delayed: MarketDataType.DELAYED,
  delayed_frozen: MarketDataType.DELAYED_FROZEN,
};

export function toBarSizeSetting(barSize: BarSize): BarSizeSetting {
  return BAR_SIZES[barSize];
}

export function toIbWhatToShow(whatToShow: WhatToShow): IbWhatToShow {
  return WHAT_TO_SHOW[whatToShow];
}

export function toMarketDataType(mode: MarketDataMode): MarketDataType {
  return MARKET_DATA_TYPES[mode];
}
