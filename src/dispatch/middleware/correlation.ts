/**
 * Correlation dispatch interceptor.
 *
 * Stamps `correlationId` and `traceId` metadata on outgoing queries.
 * A query sent while handling another one should pass the parent's metadata
 * through `parent`; otherwise the query starts a new trace.
 */

import type { MetaData } from '../messages.js';
import type { DispatchInterceptor } from '../types.js';

export interface CorrelationOptions {
  /** Metadata of the message currently being handled, if any. */
  parent?: () => MetaData | undefined;
}

function stringValue(metaData: MetaData | undefined, key: string): string | undefined {
  const value = metaData?.[key];
  return typeof value === 'string' ? value : undefined;
}

export function createCorrelationInterceptor(options: CorrelationOptions = {}): DispatchInterceptor {
  return (message) => {
    if (stringValue(message.metaData, 'traceId')) {
      return message;
    }
    const parent = options.parent?.();
    const traceId = stringValue(parent, 'traceId') ?? message.identifier;
    const correlationId = stringValue(parent, 'correlationId') ?? message.identifier;
    return message.andMetaData({ traceId, correlationId });
  };
}
