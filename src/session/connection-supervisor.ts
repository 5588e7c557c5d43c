/**
 * Connection supervisor: the single owner of the session's connection state.
 *
 *   disconnected ──connect()──▶ connecting ──link up──▶ connected
 *        ▲                          │                      │
 *        └──── budget exhausted ────┘◀──── link dropped ───┘
 *
 * Connection attempts run under bounded exponential backoff. Once the link
 * is up the reconciler re-establishes every subscription, then `ready` is
 * emitted. A dropped link triggers exactly one reconnect; if that one runs
 * out of budget the supervisor emits `fatal`.
 */

import { EventEmitter } from "eventemitter3";
import { componentLogger, describeError } from "../utils/logger.js";
import { retryWithBackoff, type BackoffPolicy } from "../utils/backoff.js";
import { ConnectionRefusedError, NotConnectedError } from "../types/errors.js";
import type { GatewayLink } from "../types/gateway.js";

const log = componentLogger("supervisor");

export type ConnectionState = "disconnected" | "connecting" | "connected";

export interface SupervisorEvents {
  stateChange: (next: ConnectionState, previous: ConnectionState) => void;
  /** Connected and every subscription re-established */
  ready: () => void;
  /** Reconnecting after a drop failed for good */
  fatal: (error: Error) => void;
  reconcileError: (error: unknown) => void;
}

/** What the supervisor drives once the link is up or down */
export interface Reestablisher {
  reestablish(): Promise<void>;
  detach(): void;
}

export interface SupervisorOptions {
  backoff: BackoffPolicy;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export class ConnectionSupervisor extends EventEmitter<SupervisorEvents> {
  private current: ConnectionState = "disconnected";
  private inFlight: Promise<void> | null = null;
  private stopped = false;
  /** Bumped on every drop so a superseded run does not announce `ready` */
  private generation = 0;

  constructor(
    private readonly link: GatewayLink,
    private readonly reconciler: Reestablisher,
    private readonly options: SupervisorOptions
  ) {
    super();
    link.on("connected", () => this.onLinkConnected());
    link.on("disconnected", (reason) => this.onLinkDisconnected(reason));
  }

  get state(): ConnectionState {
    return this.current;
  }

  /**
   * Connect and re-establish subscriptions. Concurrent callers share the
   * same attempt. Rejects with ConnectionExhaustedError when the backoff
   * budget runs out, or with the first non-retryable error.
   */
  connect(): Promise<void> {
    this.stopped = false;
    if (this.inFlight) return this.inFlight;
    if (this.current === "connected") return Promise.resolve();

    const attempt: Promise<void> = this.runConnect().finally(() => {
      if (this.inFlight === attempt) this.inFlight = null;
    });
    this.inFlight = attempt;
    return attempt;
  }

  /** Drop the current connection and go through a full reconnect */
  reconnect(): Promise<void> {
    this.stopped = false;
    if (this.current === "connected") {
      log.info("Reconnect requested");
      this.markDisconnected();
      this.link.disconnect();
    }
    return this.connect();
  }

  /** Disconnect and stay disconnected */
  stop(): void {
    this.stopped = true;
    log.info("Stopping connection supervisor");
    this.markDisconnected();
    this.link.disconnect();
  }

  // ─── Internals ────────────────────────────────────────────

  private async runConnect(): Promise<void> {
    this.transition("connecting");
    const { backoff, sleep, now } = this.options;

    try {
      await retryWithBackoff(
        (attempt) => {
          if (this.stopped) throw new NotConnectedError("connect cancelled by stop");
          log.info(`Connection attempt ${attempt}/${backoff.maxAttempts}`);
          return this.link.connect();
        },
        backoff,
        {
          isRetryable: (err) => err instanceof ConnectionRefusedError,
          onRetry: (attempt, delayMs, err) =>
            log.warn(`Attempt ${attempt} failed (${describeError(err)}), retrying in ${delayMs}ms`),
          sleep,
          now,
        }
      );
    } catch (err) {
      log.error(`Could not connect: ${describeError(err)}`);
      this.transition("disconnected");
      throw err;
    }

    if (this.stopped) return;
    await this.establish();
  }

  private async establish(): Promise<void> {
    const generation = this.generation;
    this.transition("connected");

    try {
      await this.reconciler.reestablish();
    } catch (err) {
      // the link is fine; a failed reconciliation is not a connection failure
      log.error(`Re-establishing subscriptions failed: ${describeError(err)}`);
      this.emit("reconcileError", err);
    }

    if (generation === this.generation && this.current === "connected") {
      log.info("Session ready");
      this.emit("ready");
    }
  }

  private onLinkConnected(): void {
    // connections we asked for are handled by runConnect
    if (this.stopped || this.inFlight || this.current !== "disconnected") return;

    log.info("Gateway link came back on its own");
    this.transition("connecting");
    const run: Promise<void> = this.establish().finally(() => {
      if (this.inFlight === run) this.inFlight = null;
    });
    this.inFlight = run;
  }

  private onLinkDisconnected(reason: string): void {
    if (this.current !== "connected") return;

    log.warn(`Gateway link dropped (${reason})`);
    this.markDisconnected();
    if (this.stopped) return;

    this.connect().catch((err: unknown) => {
      if (this.stopped) return;
      const error = err instanceof Error ? err : new Error(String(err));
      log.error(`Reconnect failed for good: ${describeError(error)}`);
      this.emit("fatal", error);
    });
  }

  private markDisconnected(): void {
    this.generation++;
    this.inFlight = null;
    this.reconciler.detach();
    this.transition("disconnected");
  }

  private transition(next: ConnectionState): void {
    const previous = this.current;
    if (previous === next) return;
    this.current = next;
    log.info(`Connection state: ${previous} → ${next}`);
    this.emit("stateChange", next, previous);
  }
}
