/**
 * Subscription Query Channel -- per-query update sessions.
 *
 * Each subscription query owns one session record, keyed by the message
 * instance. A session is either Pending (no consumer yet; emit/complete
 * calls are queued as deferred actions) or Attached (updates go straight to
 * the consumer's sink). Because there is exactly one record per session and
 * its tag is swapped in a single synchronous step, an update reaches a
 * matching session through exactly one path.
 */

import { UpdateDeliveryError } from '../../core/errors.js';
import { getLogger } from '../../core/logger.js';
import { asUpdateMessage, type QueryMessage, type SubscriptionQueryUpdateMessage } from '../messages.js';
import type { ResponseType } from '../response-types.js';
import type { MessageMonitor } from '../types.js';
import { UpdateStream, type SubscriptionQueryBackpressure, type UpdateSink } from './update-stream.js';

export type SessionFilter = (query: QueryMessage<unknown, unknown>) => boolean;

/** Emission side of subscription queries. */
export interface QueryUpdateEmitter {
  /**
   * Deliver `update` to every matching session. Pass a message from
   * `createUpdateMessage` to attach metadata; anything else is the payload.
   */
  emit(filter: SessionFilter, update: unknown): void;
  /** Complete every matching session. */
  complete(filter: SessionFilter): void;
  /** Fail every matching session with `cause`. */
  completeExceptionally(filter: SessionFilter, cause: unknown): void;
  /** Outstanding consumer demand per matching session; 0 while no consumer is attached. */
  requestedFromDownstream(filter: SessionFilter): Map<QueryMessage<unknown, unknown>, number>;
  /** Messages of every open session. A pending session with a buffered terminal signal is not open. */
  activeSubscriptions(): QueryMessage<unknown, unknown>[];
}

type DeferredAction =
  | { type: 'emit'; update: SubscriptionQueryUpdateMessage<unknown> }
  | { type: 'complete' }
  | { type: 'error'; cause: unknown };

/** The attached sink, with update conversion bound to the session's update type. */
interface SessionSink {
  next(update: SubscriptionQueryUpdateMessage<unknown>): void;
  replay(update: SubscriptionQueryUpdateMessage<unknown>): void;
  complete(): void;
  error(cause: unknown): void;
  fail(cause: unknown): void;
  cancel(): void;
  requestedFromDownstream(): number;
}

// A pending session with a buffered complete/error is `terminated`: it still
// replays on attach but no longer matches emitters.
type SessionState =
  | { kind: 'pending'; actions: DeferredAction[]; terminated: boolean }
  | { kind: 'attached'; sink: SessionSink };

interface Session {
  readonly query: QueryMessage<unknown, unknown>;
  state: SessionState;
}

export class SubscriptionQueryChannel implements QueryUpdateEmitter {
  private readonly sessions = new Map<QueryMessage<unknown, unknown>, Session>();

  constructor(
    private readonly updateMonitor: MessageMonitor<SubscriptionQueryUpdateMessage<unknown>>,
  ) {}

  /**
   * Create the Pending session for `query` and return its update stream.
   * Must run before the initial result is computed so updates emitted in
   * the meantime are kept.
   */
  open<U>(
    query: QueryMessage<unknown, unknown>,
    updateType: ResponseType<U>,
    backpressure: SubscriptionQueryBackpressure,
  ): UpdateStream<U> {
    if (!this.sessions.has(query)) {
      this.sessions.set(query, { query, state: { kind: 'pending', actions: [], terminated: false } });
    }
    return new UpdateStream<U>(query.queryName, backpressure, (sink) =>
      this.attach(query, updateType, sink),
    );
  }

  /** Discard the session for `query`, detaching its consumer if there is one. */
  close(query: QueryMessage<unknown, unknown>): void {
    const session = this.sessions.get(query);
    if (!session) return;
    if (session.state.kind === 'attached') {
      session.state.sink.cancel();
    }
    this.sessions.delete(query);
  }

  emit(filter: SessionFilter, update: unknown): void {
    const message = asUpdateMessage(update);
    for (const session of this.matching(filter)) {
      if (session.state.kind === 'pending') {
        session.state.actions.push({ type: 'emit', update: message });
      } else {
        this.deliver(session, session.state.sink, message);
      }
    }
  }

  complete(filter: SessionFilter): void {
    for (const session of this.matching(filter)) {
      if (session.state.kind === 'pending') {
        session.state.actions.push({ type: 'complete' });
        session.state.terminated = true;
      } else {
        this.sessions.delete(session.query);
        session.state.sink.complete();
      }
    }
  }

  completeExceptionally(filter: SessionFilter, cause: unknown): void {
    for (const session of this.matching(filter)) {
      if (session.state.kind === 'pending') {
        session.state.actions.push({ type: 'error', cause });
        session.state.terminated = true;
      } else {
        this.sessions.delete(session.query);
        session.state.sink.error(cause);
      }
    }
  }

  requestedFromDownstream(filter: SessionFilter): Map<QueryMessage<unknown, unknown>, number> {
    const demand = new Map<QueryMessage<unknown, unknown>, number>();
    for (const session of this.matching(filter)) {
      demand.set(
        session.query,
        session.state.kind === 'attached' ? session.state.sink.requestedFromDownstream() : 0,
      );
    }
    return demand;
  }

  activeSubscriptions(): QueryMessage<unknown, unknown>[] {
    return this.openSessions().map((session) => session.query);
  }

  private openSessions(): Session[] {
    return Array.from(this.sessions.values()).filter(
      (session) => session.state.kind === 'attached' || !session.state.terminated,
    );
  }

  /** Snapshot of open sessions accepted by `filter`. */
  private matching(filter: SessionFilter): Session[] {
    return this.openSessions().filter((session) => filter(session.query));
  }

  private isLive(session: Session): boolean {
    return this.sessions.get(session.query) === session;
  }

  /**
   * Pending → Attached. Deferred actions are replayed in arrival order while
   * the session is still tagged Pending, so anything emitted during the
   * replay is queued behind them rather than overtaking them.
   */
  private attach<U>(
    query: QueryMessage<unknown, unknown>,
    updateType: ResponseType<U>,
    sink: UpdateSink<U>,
  ): void {
    const session = this.sessions.get(query);
    if (!session || session.state.kind !== 'pending') {
      // Closed, completed or failed before anyone listened.
      sink.complete();
      return;
    }

    const sessionSink: SessionSink = {
      next: (update) => sink.next(updateType.convert(update.payload)),
      replay: (update) => sink.replay(updateType.convert(update.payload)),
      complete: () => sink.complete(),
      error: (cause) => sink.error(cause),
      fail: (cause) => sink.fail(cause),
      cancel: () => sink.cancel(),
      requestedFromDownstream: () => sink.requestedFromDownstream(),
    };

    sink.onDispose(() => {
      if (this.isLive(session)) {
        this.sessions.delete(query);
      }
    });

    const { actions } = session.state;
    for (let i = 0; i < actions.length && this.isLive(session); i++) {
      const action = actions[i];
      if (!action) break;
      switch (action.type) {
        case 'emit':
          this.deliver(session, sessionSink, action.update, true);
          break;
        case 'complete':
          this.sessions.delete(query);
          sessionSink.complete();
          return;
        case 'error':
          this.sessions.delete(query);
          sessionSink.error(action.cause);
          return;
      }
    }

    if (this.isLive(session)) {
      session.state = { kind: 'attached', sink: sessionSink };
    } else if (!sink.disposed) {
      // Closed by the caller while replaying.
      sink.complete();
    }
  }

  /**
   * Push one update to an attached sink. A failure ends this session only;
   * it is never thrown back to the emitter.
   */
  private deliver(
    session: Session,
    sink: SessionSink,
    update: SubscriptionQueryUpdateMessage<unknown>,
    replayed = false,
  ): void {
    const monitorCallback = this.updateMonitor.onIngested(update);
    try {
      if (replayed) {
        sink.replay(update);
      } else {
        sink.next(update);
      }
      monitorCallback.reportSuccess();
    } catch (err) {
      getLogger('subscription-query').error(
        { err, queryName: session.query.queryName, queryId: session.query.identifier },
        'An error happened while trying to emit an update to a query',
      );
      monitorCallback.reportFailure(err);
      if (this.isLive(session)) {
        this.sessions.delete(session.query);
      }
      sink.fail(
        err instanceof UpdateDeliveryError
          ? err
          : new UpdateDeliveryError(
              `Delivering an update to ${session.query.queryName} failed`,
              err,
            ),
      );
    }
  }
}
