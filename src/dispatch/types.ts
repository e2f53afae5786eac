/**
 * Query Bus — Shared Types
 *
 * Every query flows through:
 *   QueryMessage → dispatch interceptors → registry → strategy
 *     → handler interceptors (one unit of work per attempt) → QueryHandler
 */

import type { QueryMessage } from './messages.js';
import type { UnitOfWork } from './unit-of-work.js';

// ---------------------------------------------------------------------------
// Registration
// ---------------------------------------------------------------------------

/**
 * Handle returned by every register/subscribe call.
 * `cancel()` returns false when the registration was already removed.
 */
export interface Registration {
  cancel(): boolean;
}

// ---------------------------------------------------------------------------
// Handlers
// ---------------------------------------------------------------------------

/**
 * A query handler. May return the result directly or a promise of it.
 * Throwing (or rejecting with) HandlerDeclinedError hands the query to the
 * next candidate.
 */
export type QueryHandler = (message: QueryMessage<unknown, unknown>) => unknown;

// ---------------------------------------------------------------------------
// Interceptors
// ---------------------------------------------------------------------------

/**
 * Transforms an outgoing query before it is routed. Called once per call,
 * whatever the dispatch pattern.
 */
export type DispatchInterceptor = (
  message: QueryMessage<unknown, unknown>,
) => QueryMessage<unknown, unknown>;

/** Continuation to the next handler interceptor, or to the handler itself. */
export type HandlerNext = () => Promise<unknown>;

/**
 * Wraps a single handler attempt. Receives the attempt's unit of work and a
 * `next` continuation. Can short-circuit by returning without calling `next`.
 */
export type HandlerInterceptor = (
  unitOfWork: UnitOfWork<QueryMessage<unknown, unknown>>,
  next: HandlerNext,
) => Promise<unknown>;

// ---------------------------------------------------------------------------
// Monitoring
// ---------------------------------------------------------------------------

/** Outcome reporter for one ingested message. */
export interface MonitorCallback {
  reportSuccess(): void;
  reportFailure(error: unknown): void;
  reportIgnored(): void;
}

/** Notified of every message the bus ingests. */
export interface MessageMonitor<M> {
  onIngested(message: M): MonitorCallback;
}

// ---------------------------------------------------------------------------
// Scatter-gather error policy
// ---------------------------------------------------------------------------

/**
 * Decides what happens to a failed scatter-gather contribution. Throwing
 * from `onError` escalates the failure to the consumer of the results.
 */
export interface QueryInvocationErrorHandler {
  onError(error: unknown, query: QueryMessage<unknown, unknown>, handler: QueryHandler): void;
}

/** Time units accepted by scatter-gather. */
export type TimeUnit = 'milliseconds' | 'seconds' | 'minutes';
