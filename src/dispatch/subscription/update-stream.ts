/**
 * Update streams for subscription queries.
 *
 * UpdateSink is the producer side: it tracks the consumer's outstanding
 * demand, buffers what cannot be delivered yet according to the overflow
 * strategy, and delivers terminal signals after the buffer drains.
 * UpdateStream is the consumer side: a single-consumer stream that can be
 * read with `subscribe` (explicit demand) or `for await`.
 */

import { QueryBusError, StreamAlreadyConsumedError, UpdateDeliveryError } from '../../core/errors.js';
import { QueryErrorCode } from '../../types/error-codes.js';

export type OverflowStrategy = 'buffer' | 'drop' | 'latest' | 'error';

/**
 * How updates that arrive without consumer demand are handled.
 * - buffer: queue up to `bufferSize` (`Infinity` for no limit), fail delivery beyond that
 * - drop: discard them
 * - latest: keep only the most recent one
 * - error: fail delivery
 *
 * Updates held while a session was pending are replayed on attach regardless
 * of the strategy; only live updates are subject to it.
 */
export interface SubscriptionQueryBackpressure {
  overflow: OverflowStrategy;
  bufferSize: number;
}

export const DEFAULT_BACKPRESSURE: SubscriptionQueryBackpressure = {
  overflow: 'buffer',
  bufferSize: Infinity,
};

export interface UpdateSubscriber<U> {
  next(update: U): void;
  error(error: unknown): void;
  complete(): void;
}

export interface StreamSubscription {
  /** Ask for `n` more updates. `Infinity` removes the limit. */
  request(n: number): void;
  /** Detach. No further signals reach the subscriber. */
  cancel(): void;
}

type Terminal = { kind: 'complete' } | { kind: 'error'; error: unknown };

export class UpdateSink<U> implements StreamSubscription {
  private demand = 0;
  // Boxed so an `undefined` update is distinguishable from an empty queue.
  private queue: Array<{ value: U }> = [];
  private terminal: Terminal | null = null;
  private done = false;
  private draining = false;
  private readonly disposeHooks: Array<() => void> = [];

  constructor(
    private readonly subscriber: UpdateSubscriber<U>,
    private readonly backpressure: SubscriptionQueryBackpressure,
  ) {}

  get disposed(): boolean {
    return this.done;
  }

  /**
   * Offer an update. Throws UpdateDeliveryError when the overflow strategy
   * rejects it, and rethrows whatever the subscriber throws.
   */
  next(value: U): void {
    if (this.done || this.terminal) return;
    if (this.demand > 0) {
      this.queue.push({ value });
    } else {
      switch (this.backpressure.overflow) {
        case 'buffer':
          if (this.queue.length >= this.backpressure.bufferSize) {
            throw new UpdateDeliveryError(
              `Update buffer of ${this.backpressure.bufferSize} exceeded without downstream demand`,
            );
          }
          this.queue.push({ value });
          break;
        case 'drop':
          return;
        case 'latest':
          this.queue = [{ value }];
          break;
        case 'error':
          throw new UpdateDeliveryError('Update emitted without downstream demand');
      }
    }
    this.drain();
  }

  /** Queue an update held from before attach. Bypasses the overflow strategy. */
  replay(value: U): void {
    if (this.done || this.terminal) return;
    this.queue.push({ value });
    this.drain();
  }

  /** Complete once every queued update has been delivered. */
  complete(): void {
    if (this.done || this.terminal) return;
    this.terminal = { kind: 'complete' };
    this.drain();
  }

  /** Fail once every queued update has been delivered. */
  error(error: unknown): void {
    if (this.done || this.terminal) return;
    this.terminal = { kind: 'error', error };
    this.drain();
  }

  /** Fail now, discarding queued updates. */
  fail(error: unknown): void {
    if (this.done) return;
    this.queue = [];
    this.terminal = null;
    this.finish({ kind: 'error', error });
  }

  request(n: number): void {
    if (this.done) return;
    if (!(n > 0)) {
      this.fail(
        new QueryBusError(QueryErrorCode.INVALID_DEMAND, `Requested demand must be positive, got ${n}`),
      );
      return;
    }
    const total = this.demand + n;
    this.demand = total >= Number.MAX_SAFE_INTEGER ? Infinity : total;
    this.drain();
  }

  cancel(): void {
    if (this.done) return;
    this.done = true;
    this.queue = [];
    this.runDisposeHooks();
  }

  /** Outstanding demand; unbounded demand reads as Number.MAX_SAFE_INTEGER. */
  requestedFromDownstream(): number {
    return this.demand === Infinity ? Number.MAX_SAFE_INTEGER : this.demand;
  }

  /** Runs once, when the sink completes, fails, or is cancelled. */
  onDispose(hook: () => void): void {
    if (this.done) {
      hook();
      return;
    }
    this.disposeHooks.push(hook);
  }

  private drain(): void {
    if (this.draining) return;
    this.draining = true;
    try {
      while (!this.done) {
        if (this.demand > 0) {
          const item = this.queue.shift();
          if (item) {
            this.demand -= 1;
            this.subscriber.next(item.value);
            continue;
          }
        }
        if (this.queue.length === 0 && this.terminal) {
          this.finish(this.terminal);
        }
        break;
      }
    } finally {
      this.draining = false;
    }
  }

  private finish(terminal: Terminal): void {
    this.done = true;
    this.runDisposeHooks();
    if (terminal.kind === 'complete') {
      this.subscriber.complete();
    } else {
      this.subscriber.error(terminal.error);
    }
  }

  private runDisposeHooks(): void {
    for (const hook of this.disposeHooks.splice(0)) {
      hook();
    }
  }
}

interface Waiter<U> {
  resolve: (result: IteratorResult<U>) => void;
  reject: (error: unknown) => void;
}

const DONE: IteratorReturnResult<undefined> = { value: undefined, done: true };

/**
 * Single-consumer stream of updates. Nothing is attached until the first
 * `subscribe` (or the first `next()` of an async iterator); updates emitted
 * before that are held by the bus and replayed on attach.
 */
export class UpdateStream<U> implements AsyncIterable<U> {
  private consumed = false;

  constructor(
    private readonly queryName: string,
    private readonly backpressure: SubscriptionQueryBackpressure,
    private readonly attach: (sink: UpdateSink<U>) => void,
  ) {}

  /**
   * Attach `subscriber`. Initial demand defaults to unbounded.
   *
   * @throws StreamAlreadyConsumedError on a second call
   */
  subscribe(subscriber: UpdateSubscriber<U>, initialDemand: number = Infinity): StreamSubscription {
    if (this.consumed) {
      throw new StreamAlreadyConsumedError(this.queryName);
    }
    this.consumed = true;
    const sink = new UpdateSink(subscriber, this.backpressure);
    if (initialDemand > 0) {
      sink.request(initialDemand);
    }
    this.attach(sink);
    return sink;
  }

  /** Requests one update per pending `next()`; `return()` detaches. */
  [Symbol.asyncIterator](): AsyncIterator<U> {
    const waiters: Array<Waiter<U>> = [];
    let subscription: StreamSubscription | null = null;
    let finished = false;
    let failure: { error: unknown } | null = null;

    const subscriber: UpdateSubscriber<U> = {
      next: (value) => {
        waiters.shift()?.resolve({ value, done: false });
      },
      error: (error) => {
        finished = true;
        const [first, ...rest] = waiters.splice(0);
        if (first) {
          first.reject(error);
        } else {
          failure = { error };
        }
        for (const waiter of rest) waiter.resolve(DONE);
      },
      complete: () => {
        finished = true;
        for (const waiter of waiters.splice(0)) waiter.resolve(DONE);
      },
    };

    return {
      next: () => {
        if (failure) {
          const { error } = failure;
          failure = null;
          return Promise.reject(error);
        }
        if (finished) {
          return Promise.resolve(DONE);
        }
        return new Promise<IteratorResult<U>>((resolve, reject) => {
          waiters.push({ resolve, reject });
          if (subscription) {
            subscription.request(1);
          } else {
            subscription = this.subscribe(subscriber, 1);
          }
        });
      },
      return: () => {
        finished = true;
        subscription?.cancel();
        for (const waiter of waiters.splice(0)) waiter.resolve(DONE);
        return Promise.resolve(DONE);
      },
    };
  }
}
