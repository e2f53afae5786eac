/**
 * Direct Dispatcher -- resolves one response by trying candidates in order.
 *
 * Flow per candidate: fresh unit of work → handler interceptors → handler
 * → response type conversion. A decline moves on to the next candidate;
 * anything else (success or genuine failure) is the answer.
 */

import {
  HandlerDeclinedError,
  NoHandlerForQueryError,
  NoSuitableHandlerError,
  QueryBusError,
  QueryExecutionError,
  QueryHandlerExecutionError,
} from '../core/errors.js';
import { createResponseMessage, type QueryMessage, type QueryResponseMessage } from './messages.js';
import { compose } from './middleware/pipeline.js';
import type { QuerySubscription } from './registry.js';
import type { ResponseType } from './response-types.js';
import type { HandlerInterceptor, QueryHandler } from './types.js';
import type { UnitOfWorkFactory } from './unit-of-work.js';

/** What every dispatch strategy needs to run one handler attempt. */
export interface InvocationContext {
  /** Live list; a snapshot is taken per attempt. */
  readonly handlerInterceptors: readonly HandlerInterceptor[];
  readonly unitOfWorkFactory: UnitOfWorkFactory;
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === 'object' || typeof value === 'function') &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

/**
 * Calls the handler. A returned promise is awaited here so the response
 * type is applied to its settled value; a rejection other than a decline is
 * reported as QueryExecutionError.
 */
async function callHandler(
  message: QueryMessage<unknown, unknown>,
  handler: QueryHandler,
): Promise<unknown> {
  const returned = handler(message);
  if (!isPromiseLike(returned)) {
    return returned;
  }
  try {
    return await returned;
  } catch (err) {
    if (err instanceof HandlerDeclinedError) throw err;
    throw new QueryExecutionError(message.queryName, err);
  }
}

/**
 * Runs one handler attempt inside its own unit of work and converts the
 * result with `responseType`. Errors are rethrown untouched; callers decide
 * whether they mean decline or failure.
 */
export function invokeHandler<R>(
  context: InvocationContext,
  query: QueryMessage<unknown, unknown>,
  responseType: ResponseType<R>,
  handler: QueryHandler,
): Promise<QueryResponseMessage<R>> {
  const unitOfWork = context.unitOfWorkFactory.start(query);
  const chain = compose([...context.handlerInterceptors]);
  return unitOfWork.executeWithResult(async () => {
    const raw = await chain(unitOfWork, () => callHandler(unitOfWork.message, handler));
    return createResponseMessage(responseType.convert(raw));
  });
}

/** Wrap anything that is not already a bus error as a handler failure. */
export function toHandlerFailure(queryName: string, err: unknown): QueryBusError {
  return err instanceof QueryBusError ? err : new QueryHandlerExecutionError(queryName, err);
}

/**
 * Tries `candidates` in registration order until one does not decline.
 *
 * @throws NoHandlerForQueryError when there are no candidates at all
 * @throws NoSuitableHandlerError when every candidate declined
 */
export async function dispatchToFirstCandidate<R>(
  context: InvocationContext,
  query: QueryMessage<unknown, unknown>,
  responseType: ResponseType<R>,
  candidates: readonly QuerySubscription[],
): Promise<QueryResponseMessage<R>> {
  if (candidates.length === 0) {
    throw new NoHandlerForQueryError(query.queryName, query.responseType.description);
  }

  for (const candidate of candidates) {
    try {
      return await invokeHandler(context, query, responseType, candidate.handler);
    } catch (err) {
      if (err instanceof HandlerDeclinedError) {
        continue;
      }
      throw toHandlerFailure(query.queryName, err);
    }
  }

  throw new NoSuitableHandlerError(
    query.queryName,
    query.responseType.description,
    candidates.length,
  );
}
