/**
 * Query Bus -- Interceptor Pipelines
 *
 * compose() chains handler interceptors into a single interceptor.
 * applyDispatchInterceptors() folds dispatch interceptors over a message.
 */

import { QueryBusError } from '../../core/errors.js';
import { QueryErrorCode } from '../../types/error-codes.js';
import type { QueryMessage } from '../messages.js';
import type { UnitOfWork } from '../unit-of-work.js';
import type { DispatchInterceptor, HandlerInterceptor, HandlerNext } from '../types.js';

/**
 * Composes handler interceptors into a single interceptor.
 * Execution flows through the array from first to last, and results bubble
 * back up from last to first.
 *
 * @param interceptors Handler interceptors, outermost first
 * @returns A single composed interceptor
 */
export function compose(interceptors: readonly HandlerInterceptor[]): HandlerInterceptor {
  if (interceptors.length === 0) {
    return async (_uow, next: HandlerNext) => next();
  }

  return async (
    unitOfWork: UnitOfWork<QueryMessage<unknown, unknown>>,
    next: HandlerNext,
  ): Promise<unknown> => {
    let index = -1;

    async function dispatch(i: number): Promise<unknown> {
      if (i <= index) {
        throw new Error('next() called multiple times in handler interceptor');
      }
      index = i;

      const fn = interceptors[i];
      if (!fn) {
        return next();
      }
      return fn(unitOfWork, () => dispatch(i + 1));
    }

    return dispatch(0);
  };
}

/**
 * Applies dispatch interceptors in registration order; each one receives the
 * previous one's output.
 *
 * Interceptors may rewrite metadata and payload but not the response type:
 * handlers are routed by the intercepted message while results are converted
 * to the type the caller asked for, so the two must agree.
 *
 * @throws QueryBusError (INVALID_INTERCEPTION) when an interceptor swaps the response type
 */
export function applyDispatchInterceptors(
  interceptors: readonly DispatchInterceptor[],
  message: QueryMessage<unknown, unknown>,
): QueryMessage<unknown, unknown> {
  let intercepted = message;
  for (const interceptor of interceptors) {
    intercepted = interceptor(intercepted);
    if (intercepted.responseType !== message.responseType) {
      throw new QueryBusError(
        QueryErrorCode.INVALID_INTERCEPTION,
        `Dispatch interceptor changed the response type of ${message.queryName}`,
        { details: { queryName: message.queryName } },
      );
    }
  }
  return intercepted;
}
