/**
 * Order book: every order/trade the session knows about, keyed by order id.
 *
 * Fed by the gateway's order-event stream and by the open-orders snapshot
 * replayed on each (re)connect. Updates are additive and idempotent, so a
 * snapshot that repeats what the stream already delivered changes nothing.
 * Nothing is ever dropped: a status we cannot interpret is logged and kept
 * in the trade's log, and events for orders we have not seen yet are held
 * until the order itself shows up.
 */

import type { Observable, Subscription } from "rxjs";
import { componentLogger, describeError } from "../utils/logger.js";
import {
  isTerminal,
  normalizeOrderStatus,
  type Fill,
  type Order,
  type OrderEvent,
  type OrderStatus,
  type Trade,
} from "../types/orders.js";

const log = componentLogger("book");

type PendingEvent = Exclude<OrderEvent, { type: "open" }>;

/** Unseen orders whose events are held before the oldest is given up */
export const DEFAULT_MAX_PENDING_ORDERS = 500;

export class Book {
  private readonly trades = new Map<number, Trade>();
  private readonly pending = new Map<number, PendingEvent[]>();

  constructor(private readonly maxPendingOrders: number = DEFAULT_MAX_PENDING_ORDERS) {}

  /** Follow an order-event stream; returns the subscription */
  attach(events: Observable<OrderEvent>): Subscription {
    return events.subscribe({
      next: (event) => this.apply(event),
      error: (err: unknown) => log.error(`Order event stream failed: ${describeError(err)}`),
    });
  }

  /** Apply one order lifecycle event */
  apply(event: OrderEvent): void {
    if (event.type === "open") {
      this.upsertOrder(event.order, event.rawStatus);
      return;
    }

    const trade = this.trades.get(event.orderId);
    if (!trade) {
      this.hold(event);
      return;
    }

    this.applyToTrade(trade, event);
  }

  /** Record an order from the gateway's authoritative snapshot */
  recordOrder(order: Order): void {
    this.upsertOrder(order, undefined);
  }

  /**
   * Forget events held for orders that never showed up. Called when the
   * link goes away; the next open-orders replay is authoritative.
   */
  dropPending(): number {
    let dropped = 0;
    for (const [orderId, queue] of this.pending) {
      log.warn(`Dropping ${queue.length} held event(s) for order ${orderId}, never opened`);
      dropped += queue.length;
    }
    this.pending.clear();
    return dropped;
  }

  get(orderId: number): Trade | undefined {
    return this.trades.get(orderId);
  }

  getOrder(orderId: number): Order | undefined {
    return this.trades.get(orderId)?.order;
  }

  all(): Trade[] {
    return Array.from(this.trades.values());
  }

  /** Trades whose order is still working at the gateway */
  open(): Trade[] {
    return this.all().filter((trade) => !isTerminal(trade.order.status));
  }

  /** Events waiting for an order we have not seen yet */
  get pendingCount(): number {
    let count = 0;
    for (const queue of this.pending.values()) count += queue.length;
    return count;
  }

  get size(): number {
    return this.trades.size;
  }

  // ─── Internals ────────────────────────────────────────────

  private hold(event: PendingEvent): void {
    log.debug(`Holding ${event.type} event for unseen order ${event.orderId}`);
    let queue = this.pending.get(event.orderId);
    if (!queue) {
      if (this.pending.size >= this.maxPendingOrders) this.evictOldestPending();
      queue = [];
      this.pending.set(event.orderId, queue);
    }
    queue.push(event);
  }

  private evictOldestPending(): void {
    const oldest = this.pending.keys().next();
    if (oldest.done) return;
    const queue = this.pending.get(oldest.value) ?? [];
    this.pending.delete(oldest.value);
    log.warn(
      `Held events for ${this.maxPendingOrders} unseen orders; dropping ` +
      `${queue.length} event(s) for order ${oldest.value}`
    );
  }

  private upsertOrder(order: Order, rawStatus: string | undefined): void {
    const existing = this.trades.get(order.orderId);
    const recognized = rawStatus === undefined || normalizeOrderStatus(rawStatus) !== undefined;

    if (!existing) {
      const trade: Trade = {
        order: { ...order },
        fills: [],
        filled: 0,
        remaining: order.quantity,
        avgFillPrice: 0,
        log: [
          {
            time: new Date(),
            rawStatus: rawStatus ?? order.status,
            status: recognized ? order.status : "unknown",
          },
        ],
      };
      if (!recognized) {
        log.warn(`Order ${order.orderId}: unrecognized status "${rawStatus}", booked as ${order.status}`);
      }
      this.trades.set(order.orderId, trade);
      log.info(
        `Order ${order.orderId} booked: ${order.action} ${order.quantity}x ` +
        `${order.contract.symbol} ${order.orderType}` +
        `${order.limitPrice !== undefined ? ` @ ${order.limitPrice}` : ""} (${order.status})`
      );
      this.drainPending(trade);
      return;
    }

    // keep what we learned from fills; take the gateway's view of the rest
    const status = existing.order.status;
    existing.order = { ...order, status };
    if (rawStatus !== undefined && !recognized) {
      this.recordUnknown(existing, rawStatus);
      return;
    }
    this.transition(existing, rawStatus ?? order.status, order.status);
  }

  private applyToTrade(trade: Trade, event: PendingEvent): void {
    switch (event.type) {
      case "status": {
        if (!isTerminal(trade.order.status)) {
          trade.filled = event.filled;
          trade.remaining = event.remaining;
          trade.avgFillPrice = event.avgFillPrice;
        }
        const status = normalizeOrderStatus(event.rawStatus);
        if (!status) {
          this.recordUnknown(trade, event.rawStatus, event.whyHeld);
          return;
        }
        this.transition(trade, event.rawStatus, status, event.whyHeld);
        return;
      }
      case "fill":
        this.addFill(trade, event.fill);
        return;
      case "cancel":
        this.transition(trade, "Cancelled", "cancelled", event.message);
        return;
    }
  }

  private transition(
    trade: Trade,
    rawStatus: string,
    next: OrderStatus,
    message?: string
  ): void {
    const current = trade.order.status;
    if (current === next) return;

    if (isTerminal(current)) {
      log.warn(
        `Order ${trade.order.orderId}: ignoring ${rawStatus} after terminal status ${current}`
      );
      trade.log.push({ time: new Date(), rawStatus, status: next, message: "ignored after terminal" });
      return;
    }

    trade.order.status = next;
    trade.log.push({ time: new Date(), rawStatus, status: next, message });
    log.info(`Order ${trade.order.orderId}: ${current} → ${next} (${rawStatus})`);
  }

  private recordUnknown(trade: Trade, rawStatus: string, message?: string): void {
    log.warn(
      `Order ${trade.order.orderId}: unrecognized status "${rawStatus}", ` +
      `keeping ${trade.order.status}`
    );
    trade.log.push({ time: new Date(), rawStatus, status: "unknown", message });
  }

  private addFill(trade: Trade, fill: Fill): void {
    if (trade.fills.some((existing) => existing.execId === fill.execId)) return;

    trade.fills.push(fill);
    const quantity = trade.fills.reduce((sum, f) => sum + f.quantity, 0);
    const notional = trade.fills.reduce((sum, f) => sum + f.quantity * f.price, 0);
    trade.filled = quantity;
    trade.remaining = Math.max(trade.order.quantity - quantity, 0);
    trade.avgFillPrice = quantity > 0 ? notional / quantity : 0;

    log.info(
      `Order ${trade.order.orderId} fill ${fill.execId}: ${fill.quantity} @ ${fill.price} ` +
      `(${trade.filled}/${trade.order.quantity})`
    );
    if (trade.remaining === 0) {
      this.transition(trade, "Filled", "filled");
    }
  }

  private drainPending(trade: Trade): void {
    const queue = this.pending.get(trade.order.orderId);
    if (!queue) return;
    this.pending.delete(trade.order.orderId);
    for (const event of queue) this.applyToTrade(trade, event);
  }
}
