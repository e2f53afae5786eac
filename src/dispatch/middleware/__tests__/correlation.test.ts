import { describe, it, expect } from 'vitest';
import { createCorrelationInterceptor } from '../correlation.js';
import { createQueryMessage } from '../../messages.js';
import { instanceOf } from '../../response-types.js';
import { Text } from '../../__tests__/fixtures/types.js';

describe('createCorrelationInterceptor', () => {
  it('starts a new trace from the message identifier', () => {
    const message = createQueryMessage('x', instanceOf(Text), 'lookup');

    const stamped = createCorrelationInterceptor()(message);

    expect(stamped.metaData).toEqual({
      traceId: message.identifier,
      correlationId: message.identifier,
    });
  });

  it('continues the parent trace', () => {
    const interceptor = createCorrelationInterceptor({
      parent: () => ({ traceId: 'trace-1', correlationId: 'parent-1' }),
    });

    const stamped = interceptor(createQueryMessage('x', instanceOf(Text), 'lookup'));

    expect(stamped.metaData).toEqual({ traceId: 'trace-1', correlationId: 'parent-1' });
  });

  it('leaves an already traced message untouched', () => {
    const message = createQueryMessage('x', instanceOf(Text), 'lookup', { traceId: 'existing' });

    expect(createCorrelationInterceptor()(message)).toBe(message);
  });
});
