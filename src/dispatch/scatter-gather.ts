/**
 * Scatter-Gather Dispatcher -- every matching handler, one shared deadline.
 *
 * Each handler is tried exactly once in registration order, with whatever is
 * left of the deadline. Only successes are yielded; failures, declines and
 * timeouts go to the monitor and the error handler.
 */

import { QueryTimeoutError } from '../core/errors.js';
import { invokeHandler, toHandlerFailure, type InvocationContext } from './dispatcher.js';
import { remainingOfDeadline, withTimeout } from './lib/timeout.js';
import type { QueryMessage, QueryResponseMessage } from './messages.js';
import type { QuerySubscription } from './registry.js';
import type { ResponseType } from './response-types.js';
import type { MonitorCallback, QueryInvocationErrorHandler } from './types.js';

export interface ScatterGatherRequest<R> {
  readonly query: QueryMessage<unknown, unknown>;
  readonly responseType: ResponseType<R>;
  readonly candidates: readonly QuerySubscription[];
  /** Absolute deadline, epoch milliseconds. */
  readonly deadline: number;
  readonly monitorCallback: MonitorCallback;
  readonly errorHandler: QueryInvocationErrorHandler;
}

/**
 * Lazily invokes the candidates as the caller iterates. The generator is
 * single-use: iterating it a second time yields nothing.
 */
export async function* gatherResponses<R>(
  context: InvocationContext,
  request: ScatterGatherRequest<R>,
): AsyncGenerator<QueryResponseMessage<R>, void, undefined> {
  const { query, responseType, monitorCallback, errorHandler } = request;

  for (const candidate of request.candidates) {
    const remaining = remainingOfDeadline(request.deadline);
    let response: QueryResponseMessage<R>;
    try {
      if (remaining <= 0) {
        throw new QueryTimeoutError(query.queryName, remaining);
      }
      response = await withTimeout(
        invokeHandler(context, query, responseType, candidate.handler),
        remaining,
        () => new QueryTimeoutError(query.queryName, remaining),
      );
    } catch (err) {
      const failure = toHandlerFailure(query.queryName, err);
      monitorCallback.reportFailure(failure);
      errorHandler.onError(failure, query, candidate.handler);
      continue;
    }
    monitorCallback.reportSuccess();
    yield response;
  }
}
