/**
 * Simple Query Bus -- the in-process bus facade.
 *
 * Wires the registry, the interceptor chains and the three dispatch
 * strategies together:
 *   query()             direct dispatch with decline fallback
 *   scatterGather()     every matching handler under one shared deadline
 *   subscriptionQuery() initial result plus a per-session update stream
 *
 * The bus is also the QueryUpdateEmitter for its own subscription queries.
 */

import { getLogger } from '../core/logger.js';
import { dispatchToFirstCandidate, type InvocationContext } from './dispatcher.js';
import { createErrorHandler } from './lib/error-handlers.js';
import { toMillis } from './lib/timeout.js';
import type { QueryMessage, QueryResponseMessage, SubscriptionQueryMessage, SubscriptionQueryUpdateMessage } from './messages.js';
import { applyDispatchInterceptors } from './middleware/pipeline.js';
import { createTransactionInterceptor, type TransactionManager } from './middleware/transaction.js';
import { noOpMessageMonitor } from './monitor.js';
import { SubscriptionRegistry, type QuerySubscription } from './registry.js';
import type { DeclaredType, ResponseType } from './response-types.js';
import { gatherResponses } from './scatter-gather.js';
import { SubscriptionQueryChannel, type QueryUpdateEmitter, type SessionFilter } from './subscription/channel.js';
import { DefaultSubscriptionQueryResult, type SubscriptionQueryResult } from './subscription/result.js';
import { DEFAULT_BACKPRESSURE, type SubscriptionQueryBackpressure } from './subscription/update-stream.js';
import type {
  DispatchInterceptor,
  HandlerInterceptor,
  MessageMonitor,
  QueryHandler,
  QueryInvocationErrorHandler,
  Registration,
  TimeUnit,
} from './types.js';
import { defaultUnitOfWorkFactory, type UnitOfWorkFactory } from './unit-of-work.js';

export interface QueryBus extends QueryUpdateEmitter {
  subscribe(queryName: string, declaredType: DeclaredType, handler: QueryHandler): Registration;
  query<P, R>(query: QueryMessage<P, R>): Promise<QueryResponseMessage<R>>;
  scatterGather<P, R>(
    query: QueryMessage<P, R>,
    timeout?: number,
    unit?: TimeUnit,
  ): AsyncIterable<QueryResponseMessage<R>>;
  subscriptionQuery<P, I, U>(
    query: SubscriptionQueryMessage<P, I, U>,
    backpressure?: SubscriptionQueryBackpressure,
  ): SubscriptionQueryResult<I, U>;
  registerDispatchInterceptor(interceptor: DispatchInterceptor): Registration;
  registerHandlerInterceptor(interceptor: HandlerInterceptor): Registration;
}

export interface SimpleQueryBusOptions {
  /** Monitors queries. Defaults to a no-op monitor. */
  messageMonitor?: MessageMonitor<QueryMessage<unknown, unknown>>;
  /** Monitors subscription query updates. Defaults to a no-op monitor. */
  updateMessageMonitor?: MessageMonitor<SubscriptionQueryUpdateMessage<unknown>>;
  /** Scatter-gather failure policy. Defaults to logging. */
  errorHandler?: QueryInvocationErrorHandler;
  unitOfWorkFactory?: UnitOfWorkFactory;
  /** When set, every handler attempt runs inside a transaction. */
  transactionManager?: TransactionManager;
  defaultBackpressure?: SubscriptionQueryBackpressure;
  /** Used by scatterGather() when called without a timeout. */
  defaultScatterGatherTimeoutMs?: number;
}

export const DEFAULT_SCATTER_GATHER_TIMEOUT_MS = 5_000;

async function* noResponses<R>(): AsyncGenerator<QueryResponseMessage<R>, void, undefined> {
  // Nothing registered: the sequence is empty.
}

function removeFrom<T>(list: T[], item: T): Registration {
  return {
    cancel: () => {
      const index = list.indexOf(item);
      if (index === -1) return false;
      list.splice(index, 1);
      return true;
    },
  };
}

export class SimpleQueryBus implements QueryBus {
  private readonly registry = new SubscriptionRegistry();
  private readonly dispatchInterceptors: DispatchInterceptor[] = [];
  private readonly handlerInterceptors: HandlerInterceptor[] = [];
  private readonly context: InvocationContext;
  private readonly channel: SubscriptionQueryChannel;
  private readonly messageMonitor: MessageMonitor<QueryMessage<unknown, unknown>>;
  private readonly errorHandler: QueryInvocationErrorHandler;
  private readonly defaultBackpressure: SubscriptionQueryBackpressure;
  private readonly defaultScatterGatherTimeoutMs: number;

  constructor(options: SimpleQueryBusOptions = {}) {
    this.messageMonitor = options.messageMonitor ?? noOpMessageMonitor;
    this.errorHandler = options.errorHandler ?? createErrorHandler('log');
    this.defaultBackpressure = options.defaultBackpressure ?? DEFAULT_BACKPRESSURE;
    this.defaultScatterGatherTimeoutMs =
      options.defaultScatterGatherTimeoutMs ?? DEFAULT_SCATTER_GATHER_TIMEOUT_MS;
    this.context = {
      handlerInterceptors: this.handlerInterceptors,
      unitOfWorkFactory: options.unitOfWorkFactory ?? defaultUnitOfWorkFactory,
    };
    this.channel = new SubscriptionQueryChannel(options.updateMessageMonitor ?? noOpMessageMonitor);
    if (options.transactionManager) {
      this.registerHandlerInterceptor(createTransactionInterceptor(options.transactionManager));
    }
  }

  // ---------------------------------------------------------------------------
  // Registration
  // ---------------------------------------------------------------------------

  subscribe(queryName: string, declaredType: DeclaredType, handler: QueryHandler): Registration {
    return this.registry.subscribe(queryName, declaredType, handler);
  }

  /** Read-only view of every handler registration, keyed by query name. */
  subscriptions(): ReadonlyMap<string, readonly QuerySubscription[]> {
    return this.registry.subscriptions();
  }

  registerDispatchInterceptor(interceptor: DispatchInterceptor): Registration {
    this.dispatchInterceptors.push(interceptor);
    return removeFrom(this.dispatchInterceptors, interceptor);
  }

  registerHandlerInterceptor(interceptor: HandlerInterceptor): Registration {
    this.handlerInterceptors.push(interceptor);
    return removeFrom(this.handlerInterceptors, interceptor);
  }

  // ---------------------------------------------------------------------------
  // Dispatch
  // ---------------------------------------------------------------------------

  async query<P, R>(query: QueryMessage<P, R>): Promise<QueryResponseMessage<R>> {
    const monitorCallback = this.messageMonitor.onIngested(query);
    let response: QueryResponseMessage<R>;
    try {
      response = await this.dispatch(this.intercept(query), query.responseType);
    } catch (err) {
      getLogger('query-bus').debug(
        { err, queryName: query.queryName, queryId: query.identifier },
        'Query failed',
      );
      monitorCallback.reportFailure(err);
      throw err;
    }
    monitorCallback.reportSuccess();
    return response;
  }

  scatterGather<P, R>(
    query: QueryMessage<P, R>,
    timeout: number = this.defaultScatterGatherTimeoutMs,
    unit: TimeUnit = 'milliseconds',
  ): AsyncIterable<QueryResponseMessage<R>> {
    const monitorCallback = this.messageMonitor.onIngested(query);
    let intercepted: QueryMessage<unknown, unknown>;
    let candidates: QuerySubscription[];
    try {
      intercepted = this.intercept(query);
      candidates = this.registry.handlersFor(intercepted);
    } catch (err) {
      monitorCallback.reportFailure(err);
      throw err;
    }

    if (candidates.length === 0) {
      getLogger('query-bus').debug({ queryName: query.queryName }, 'No handlers for scatter-gather query');
      monitorCallback.reportIgnored();
      return noResponses<R>();
    }

    return gatherResponses(this.context, {
      query: intercepted,
      responseType: query.responseType,
      candidates,
      deadline: Date.now() + toMillis(timeout, unit),
      monitorCallback,
      errorHandler: this.errorHandler,
    });
  }

  subscriptionQuery<P, I, U>(
    query: SubscriptionQueryMessage<P, I, U>,
    backpressure: SubscriptionQueryBackpressure = this.defaultBackpressure,
  ): SubscriptionQueryResult<I, U> {
    const monitorCallback = this.messageMonitor.onIngested(query);
    let intercepted: QueryMessage<unknown, unknown>;
    try {
      intercepted = this.intercept(query);
    } catch (err) {
      monitorCallback.reportFailure(err);
      throw err;
    }
    // The session must exist before any handler runs.
    const updates = this.channel.open(intercepted, query.updateResponseType, backpressure);

    const computeInitial = async (): Promise<QueryResponseMessage<I>> => {
      let response: QueryResponseMessage<I>;
      try {
        response = await this.dispatch(intercepted, query.responseType);
      } catch (err) {
        monitorCallback.reportFailure(err);
        throw err;
      }
      monitorCallback.reportSuccess();
      return response;
    };

    return new DefaultSubscriptionQueryResult(computeInitial, updates, () =>
      this.channel.close(intercepted),
    );
  }

  // ---------------------------------------------------------------------------
  // Emission
  // ---------------------------------------------------------------------------

  emit(filter: SessionFilter, update: unknown): void {
    this.channel.emit(filter, update);
  }

  complete(filter: SessionFilter): void {
    this.channel.complete(filter);
  }

  completeExceptionally(filter: SessionFilter, cause: unknown): void {
    this.channel.completeExceptionally(filter, cause);
  }

  requestedFromDownstream(filter: SessionFilter): Map<QueryMessage<unknown, unknown>, number> {
    return this.channel.requestedFromDownstream(filter);
  }

  activeSubscriptions(): QueryMessage<unknown, unknown>[] {
    return this.channel.activeSubscriptions();
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private intercept(query: QueryMessage<unknown, unknown>): QueryMessage<unknown, unknown> {
    return applyDispatchInterceptors(this.dispatchInterceptors, query);
  }

  private dispatch<R>(
    intercepted: QueryMessage<unknown, unknown>,
    responseType: ResponseType<R>,
  ): Promise<QueryResponseMessage<R>> {
    return dispatchToFirstCandidate(
      this.context,
      intercepted,
      responseType,
      this.registry.handlersFor(intercepted),
    );
  }
}
