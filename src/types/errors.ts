/**
 * Error taxonomy for the session layer.
 *
 * Connection errors are the only ones retried (and only the transient kind).
 * Everything else is reported with the offending instrument or order id.
 */

import type { InstrumentKey } from "./market.js";

/** The gateway refused or reset the connection. Retried under backoff. */
export class ConnectionRefusedError extends Error {
  constructor(message: string, public readonly code?: number) {
    super(message);
    this.name = "ConnectionRefusedError";
  }
}

/** Backoff budget used up. Fatal for the connect call that raised it. */
export class ConnectionExhaustedError extends Error {
  constructor(
    public readonly attempts: number,
    public readonly elapsedMs: number,
    public readonly lastError: unknown
  ) {
    super(
      `Gave up connecting to the gateway after ${attempts} attempt(s) in ${elapsedMs}ms`
    );
    this.name = "ConnectionExhaustedError";
  }
}

export class NotConnectedError extends Error {
  constructor(operation: string) {
    super(`Gateway not connected (${operation})`);
    this.name = "NotConnectedError";
  }
}

export class InstrumentResolutionError extends Error {
  constructor(
    public readonly conId: InstrumentKey,
    public readonly symbol: string,
    message: string
  ) {
    super(`Could not resolve ${symbol} (conId ${conId}): ${message}`);
    this.name = "InstrumentResolutionError";
  }
}

export class OrderNotFoundError extends Error {
  constructor(public readonly orderId: number) {
    super(`Order ${orderId} is not in the book`);
    this.name = "OrderNotFoundError";
  }
}

export class OrderOwnershipError extends Error {
  constructor(
    public readonly orderId: number,
    public readonly ownerClientId: number,
    public readonly sessionClientId: number
  ) {
    super(
      `Order ${orderId} belongs to client ${ownerClientId}, ` +
        `this session is client ${sessionClientId}`
    );
    this.name = "OrderOwnershipError";
  }
}

export class PriceUnavailableError extends Error {
  constructor(public readonly conId: InstrumentKey, public readonly symbol: string) {
    super(`No usable price in snapshot for ${symbol} (conId ${conId})`);
    this.name = "PriceUnavailableError";
  }
}

export class StreamCompletedError extends Error {
  constructor() {
    super("Stream completed without producing a value");
    this.name = "StreamCompletedError";
  }
}
