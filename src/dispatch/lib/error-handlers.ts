/**
 * Scatter-gather error policies.
 *
 * A failed contribution never fails the whole scatter-gather on its own; the
 * configured policy decides whether it is logged, dropped, or escalated.
 */

import { getLogger } from '../../core/logger.js';
import type { QueryMessage } from '../messages.js';
import type { QueryHandler, QueryInvocationErrorHandler } from '../types.js';

export type ErrorPolicy = 'log' | 'ignore' | 'rethrow';

/** Logs each failure at warn level and carries on. The default policy. */
export class LoggingQueryInvocationErrorHandler implements QueryInvocationErrorHandler {
  onError(error: unknown, query: QueryMessage<unknown, unknown>, handler: QueryHandler): void {
    getLogger('scatter-gather').warn(
      { err: error, queryName: query.queryName, queryId: query.identifier, handler: handler.name || 'anonymous' },
      'A query handler failed during scatter-gather; its result is omitted',
    );
  }
}

/** Drops failures silently. */
export class IgnoringQueryInvocationErrorHandler implements QueryInvocationErrorHandler {
  onError(): void {}
}

/** Rethrows the failure, ending the consumer's iteration with it. */
export class RethrowingQueryInvocationErrorHandler implements QueryInvocationErrorHandler {
  onError(error: unknown): void {
    throw error;
  }
}

export function createErrorHandler(policy: ErrorPolicy): QueryInvocationErrorHandler {
  switch (policy) {
    case 'log':
      return new LoggingQueryInvocationErrorHandler();
    case 'ignore':
      return new IgnoringQueryInvocationErrorHandler();
    case 'rethrow':
      return new RethrowingQueryInvocationErrorHandler();
  }
}
