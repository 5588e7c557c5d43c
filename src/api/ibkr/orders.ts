/**
 * Order placement and cancellation.
 *
 * Strategy code thinks in notional amounts ("buy $5,000 of X"). This module
 * turns that into a share quantity and a limit price from one price
 * snapshot, submits it through the gateway link, and hands back an
 * observer over the order's progress.
 */

import { take } from "rxjs";
import { CachedObserver } from "../../reactive/cached-observer.js";
import { componentLogger, describeError } from "../../utils/logger.js";
import { NotionalOrderSchema } from "../../utils/validation.js";
import {
  NotConnectedError,
  OrderNotFoundError,
  OrderOwnershipError,
  PriceUnavailableError,
} from "../../types/errors.js";
import { contractFromInstrument, type Instrument, type Ticker } from "../../types/market.js";
import type { GatewayLink } from "../../types/gateway.js";
import type { OrderAction, OrderRequest, OrderResult, Trade } from "../../types/orders.js";
import type { Book } from "../../trading/book.js";

const log = componentLogger("ibkr-orders");

export interface NotionalOrderOptions {
  /** Shift the limit 10% away from the market so the order rests unfilled */
  debug?: boolean;
}

/** A submitted order and the observer following it */
export interface PlacedOrder {
  request: OrderRequest;
  /** Price the quantity was sized on */
  price: number;
  progress: CachedObserver<OrderResult>;
}

/**
 * Round to the nearest integer, ties to even (2.5 → 2, 3.5 → 4).
 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Whole units for a notional amount at a price. Anything between zero
 * and one unit becomes one unit.
 */
export function computeOrderQuantity(notional: number, price: number): number {
  if (!Number.isFinite(price) || price <= 0) {
    throw new RangeError(`Cannot size an order on price ${price}`);
  }
  let quantity = notional / price;
  if (quantity > 0 && quantity < 1) quantity = 1;
  return roundHalfEven(quantity);
}

/** Limit moved 10% away from the market, in cents */
export function debugLimitPrice(price: number, action: OrderAction): number {
  const shifted = action === "BUY" ? price * 0.9 : price * 1.1;
  return Math.round(shifted * 100) / 100;
}

/** Bid, or the last trade when the snapshot carries no bid */
export function pickPrice(ticker: Ticker): number | undefined {
  return ticker.bid ?? ticker.last;
}

/**
 * Size and submit a limit order for `notional` worth of `instrument`.
 *
 * Takes exactly one price snapshot. The returned observer caches the
 * latest order result; `progress.waitValue()` resolves as soon as the
 * gateway has assigned an order id.
 */
export async function placeNotionalOrder(
  link: GatewayLink,
  instrument: Instrument,
  action: OrderAction,
  notional: number,
  options: NotionalOrderOptions = {}
): Promise<PlacedOrder> {
  const params = NotionalOrderSchema.parse({
    conId: instrument.conId,
    action,
    notional,
    debug: options.debug,
  });

  if (!link.isConnected()) throw new NotConnectedError("placeOrder");

  const contract = contractFromInstrument(instrument);
  const snapshot = new CachedObserver<Ticker>();
  snapshot.subscribe(link.contractTicks(contract, { snapshot: true }).pipe(take(1)));
  const ticker = await snapshot.waitValue();

  const price = pickPrice(ticker);
  if (price === undefined) {
    throw new PriceUnavailableError(instrument.conId, instrument.symbol);
  }

  const quantity = computeOrderQuantity(params.notional, price);
  const limitPrice = params.debug ? debugLimitPrice(price, params.action) : price;
  log.debug(
    `Sized ${params.action} ${instrument.symbol}: ${params.notional} / ${price} → ${quantity} @ ${limitPrice}`
  );

  const request: OrderRequest = {
    action: params.action,
    quantity,
    orderType: "LMT",
    limitPrice,
  };

  const progress = new CachedObserver<OrderResult>({
    onNext: (result) => {
      log.debug(`Order ${result.orderId} ${instrument.symbol}: ${result.rawStatus} (${result.filled}/${quantity})`);
    },
    onError: (err) => {
      log.error(`Order for ${instrument.symbol} (conId ${instrument.conId}) failed: ${describeError(err)}`);
    },
  });
  progress.subscribe(link.placeOrder(contract, request));

  return { request, price, progress };
}

/**
 * Cancel an order this session placed. Unknown orders and orders owned
 * by another client id are refused before anything reaches the gateway.
 */
export function cancelOwnedOrder(link: GatewayLink, book: Book, orderId: number): Trade {
  const trade = book.get(orderId);
  if (!trade) {
    log.error(`Cannot cancel order ${orderId}: not in the book`);
    throw new OrderNotFoundError(orderId);
  }
  if (trade.order.clientId !== link.clientId) {
    log.error(
      `Cannot cancel order ${orderId}: owned by client ${trade.order.clientId}, ` +
      `this session is client ${link.clientId}`
    );
    throw new OrderOwnershipError(orderId, trade.order.clientId, link.clientId);
  }
  if (!link.isConnected()) throw new NotConnectedError("cancelOrder");

  log.info(`Cancelling order ${orderId} (${trade.order.action} ${trade.order.quantity}x ${trade.order.contract.symbol})`);
  link.cancelOrder(orderId);
  return trade;
}
