/**
 * Logging handler interceptor.
 *
 * Writes one pino entry per handler attempt (subsystem: 'interceptor'):
 * debug for successes and declines, warn for failures.
 */

import { getLogger } from '../../core/logger.js';
import { HandlerDeclinedError } from '../../core/errors.js';
import type { HandlerInterceptor } from '../types.js';

export function createLoggingInterceptor(): HandlerInterceptor {
  return async (unitOfWork, next) => {
    const log = getLogger('interceptor');
    const { queryName, identifier } = unitOfWork.message;
    const startTime = Date.now();
    try {
      const result = await next();
      log.debug({ queryName, queryId: identifier, durationMs: Date.now() - startTime }, 'Query handled');
      return result;
    } catch (err) {
      const durationMs = Date.now() - startTime;
      if (err instanceof HandlerDeclinedError) {
        log.debug({ queryName, queryId: identifier, durationMs }, 'Query declined by handler');
      } else {
        log.warn({ err, queryName, queryId: identifier, durationMs }, 'Query handler failed');
      }
      throw err;
    }
  };
}
