/**
 * Single-slot result cache over a push stream.
 *
 * Attach it to an Observable and any number of callers can later ask for
 * "the current or next value" without subscribing again. One-shot
 * request/response flows (a price snapshot, an order's progress) become a
 * single await over what is otherwise a long-lived stream.
 *
 * Usage:
 *   const observer = new CachedObserver<Ticker>();
 *   observer.subscribe(link.contractTicks(contract, { snapshot: true }).pipe(take(1)));
 *   const ticker = await observer.waitValue();
 */

import type { Observable, Observer, Subscription } from "rxjs";
import { StreamCompletedError } from "../types/errors.js";
import { componentLogger, describeError } from "../utils/logger.js";

const log = componentLogger("cached-observer");

export interface CachedObserverOptions<T> {
  /** Called for every value; may be async */
  onNext?: (value: T) => void | Promise<void>;
  /** Called for upstream errors and, when captured, for onNext failures */
  onError?: (err: unknown) => void | Promise<void>;
  /**
   * Route onNext failures to onError instead of letting them escape
   * into the stream. Defaults to true.
   */
  captureNextErrors?: boolean;
}

interface Waiter<T> {
  resolve: (value: T) => void;
  reject: (err: unknown) => void;
}

export class CachedObserver<T> implements Observer<T> {
  private latest: { value: T } | null = null;
  private failure: { error: unknown } | null = null;
  private completed = false;
  private waiters: Waiter<T>[] = [];
  private subscription: Subscription | null = null;

  constructor(private readonly options: CachedObserverOptions<T> = {}) {}

  /** Attach to a stream and begin caching its values */
  subscribe(stream: Observable<T>): Subscription {
    this.subscription = stream.subscribe(this);
    return this.subscription;
  }

  /**
   * Resolve with the cached value, or wait for the next one.
   * Rejects with the upstream error once the stream has failed.
   */
  waitValue(): Promise<T> {
    if (this.failure) return Promise.reject(this.failure.error);
    if (this.latest) return Promise.resolve(this.latest.value);
    if (this.completed) return Promise.reject(new StreamCompletedError());

    return new Promise<T>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  get hasValue(): boolean {
    return this.latest !== null;
  }

  get value(): T | undefined {
    return this.latest?.value;
  }

  get lastError(): unknown {
    return this.failure?.error;
  }

  get isClosed(): boolean {
    return this.completed || this.failure !== null;
  }

  /** Stop receiving values; callers still waiting are rejected */
  dispose(): void {
    this.subscription?.unsubscribe();
    this.subscription = null;
    if (!this.latest && !this.failure) {
      this.completed = true;
      this.flush((waiter) => waiter.reject(new StreamCompletedError()));
    }
  }

  // ─── Observer ─────────────────────────────────────────────

  next(value: T): void {
    this.latest = { value };
    this.flush((waiter) => waiter.resolve(value));

    const handler = this.options.onNext;
    if (!handler) return;

    // uncaptured handler failures fail the observer like an upstream error
    const capture = this.options.captureNextErrors ?? true;
    const onFailure = capture
      ? (err: unknown) => this.reportHandlerError(err)
      : (err: unknown) => this.error(err);

    try {
      const pending = handler(value);
      if (pending) pending.catch(onFailure);
    } catch (err) {
      onFailure(err);
    }
  }

  error(err: unknown): void {
    this.failure = { error: err };
    this.flush((waiter) => waiter.reject(err));
    this.invokeOnError(err);
  }

  complete(): void {
    this.completed = true;
    if (!this.latest) {
      this.flush((waiter) => waiter.reject(new StreamCompletedError()));
    }
  }

  // ─── Internals ────────────────────────────────────────────

  private flush(settle: (waiter: Waiter<T>) => void): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) settle(waiter);
  }

  private reportHandlerError(err: unknown): void {
    if (this.options.onError) {
      this.invokeOnError(err);
      return;
    }
    log.error(`Value handler failed: ${describeError(err)}`);
  }

  private invokeOnError(err: unknown): void {
    const handler = this.options.onError;
    if (!handler) return;
    try {
      const pending = handler(err);
      if (pending) {
        pending.catch((inner: unknown) =>
          log.error(`Error handler failed: ${describeError(inner)}`)
        );
      }
    } catch (inner) {
      log.error(`Error handler failed: ${describeError(inner)}`);
    }
  }
}
