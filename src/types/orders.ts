/**
 * Order, fill and trade type definitions.
 */

import type { ContractRef } from "./market.js";

export type OrderAction = "BUY" | "SELL";

export type OrderType = "LMT" | "MKT";

/** Owner recorded for orders the gateway reported without a client id */
export const UNKNOWN_CLIENT_ID = -1;

/** Normalized order lifecycle status */
export type OrderStatus = "submitted" | "open" | "filled" | "cancelled" | "rejected";

export interface Order {
  orderId: number;
  /** Client id of the API session that placed the order */
  clientId: number;
  permId?: number;
  contract: ContractRef;
  action: OrderAction;
  quantity: number;
  orderType: OrderType;
  limitPrice?: number;
  status: OrderStatus;
}

/** What a caller asks the gateway to place */
export interface OrderRequest {
  action: OrderAction;
  quantity: number;
  orderType: OrderType;
  limitPrice?: number;
}

export interface Fill {
  execId: string;
  quantity: number;
  price: number;
  time: Date;
}

/** One entry of a trade's status history */
export interface TradeLogEntry {
  time: Date;
  /** Status string exactly as the gateway sent it */
  rawStatus: string;
  status: OrderStatus | "unknown";
  message?: string;
}

/** An order together with its fills and status history */
export interface Trade {
  order: Order;
  fills: Fill[];
  filled: number;
  remaining: number;
  avgFillPrice: number;
  log: TradeLogEntry[];
}

/** Order lifecycle events streamed by the gateway */
export type OrderEvent =
  | { type: "open"; order: Order; rawStatus: string }
  | {
      type: "status";
      orderId: number;
      rawStatus: string;
      filled: number;
      remaining: number;
      avgFillPrice: number;
      clientId?: number;
      whyHeld?: string;
    }
  | { type: "fill"; orderId: number; fill: Fill }
  | { type: "cancel"; orderId: number; message?: string };

/** Progress of an order placed through this session */
export interface OrderResult {
  orderId: number;
  status: OrderStatus | "unknown";
  rawStatus: string;
  filled: number;
  remaining: number;
  avgFillPrice: number;
}

const STATUS_MAP = new Map<string, OrderStatus>([
  ["ApiPending", "submitted"],
  ["PendingSubmit", "submitted"],
  ["PreSubmitted", "open"],
  ["Submitted", "open"],
  ["PendingCancel", "open"],
  ["Filled", "filled"],
  ["Cancelled", "cancelled"],
  ["ApiCancelled", "cancelled"],
  ["Inactive", "rejected"],
]);

/**
 * Map a gateway status string onto the normalized lifecycle.
 * Returns undefined for strings we do not recognize.
 */
export function normalizeOrderStatus(rawStatus: string): OrderStatus | undefined {
  return STATUS_MAP.get(rawStatus);
}

const TERMINAL: ReadonlySet<OrderStatus> = new Set<OrderStatus>(["filled", "cancelled", "rejected"]);

/** Filled, cancelled and rejected orders never change status again */
export function isTerminal(status: OrderStatus | "unknown"): boolean {
  return status !== "unknown" && TERMINAL.has(status);
}
