import { describe, it, expect, vi, afterEach } from 'vitest';
import { DEFAULTS, type QueryBusConfig } from '../../core/config.js';
import { createQueryBus } from '../factory.js';
import { RethrowingQueryInvocationErrorHandler } from '../lib/error-handlers.js';
import { createQueryMessage, createSubscriptionQueryMessage } from '../messages.js';
import { instanceOf, returns } from '../response-types.js';
import { Count, Text } from './fixtures/types.js';

function configWith(patch: Partial<QueryBusConfig>): QueryBusConfig {
  return { ...structuredClone(DEFAULTS), ...patch };
}

describe('createQueryBus', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('applies the configured error policy', async () => {
    const bus = createQueryBus(
      configWith({ scatterGather: { defaultTimeoutMs: 1_000, errorPolicy: 'rethrow' } }),
    );
    bus.subscribe('fanout', returns(Text), () => {
      throw new Error('boom');
    });

    const consume = async (): Promise<void> => {
      for await (const _response of bus.scatterGather(createQueryMessage('q', instanceOf(Text), 'fanout'))) {
        // drain
      }
    };

    await expect(consume()).rejects.toThrow('Handler for fanout failed: boom');
  });

  it('applies the configured default timeout', async () => {
    vi.useFakeTimers();
    const bus = createQueryBus(
      configWith({ scatterGather: { defaultTimeoutMs: 10, errorPolicy: 'ignore' } }),
    );
    bus.subscribe('fanout', returns(Text), () => new Promise((resolve) => setTimeout(() => resolve('late'), 50)));

    const collected: string[] = [];
    const consume = (async () => {
      for await (const response of bus.scatterGather(createQueryMessage('q', instanceOf(Text), 'fanout'))) {
        collected.push(response.payload);
      }
    })();
    await vi.advanceTimersByTimeAsync(100);
    await consume;

    expect(collected).toEqual([]);
  });

  it('applies the configured backpressure', () => {
    const bus = createQueryBus(configWith({ updates: { overflow: 'drop', bufferSize: 4 } }));
    bus.subscribe('counter', returns(Count), () => 0);
    const result = bus.subscriptionQuery(
      createSubscriptionQueryMessage('c', instanceOf(Count), instanceOf(Count), 'counter'),
    );
    const received: number[] = [];
    const subscription = result.updates().subscribe(
      { next: (value) => received.push(value), error: () => {}, complete: () => {} },
      0,
    );

    bus.emit(() => true, 1);
    subscription.request(1);
    bus.emit(() => true, 2);

    expect(received).toEqual([2]);
  });

  it('lets explicit options override the configuration', async () => {
    const bus = createQueryBus(configWith({}), { errorHandler: new RethrowingQueryInvocationErrorHandler() });
    bus.subscribe('fanout', returns(Text), () => {
      throw new Error('boom');
    });

    const iterator = bus.scatterGather(createQueryMessage('q', instanceOf(Text), 'fanout'))[Symbol.asyncIterator]();

    await expect(iterator.next()).rejects.toThrow('Handler for fanout failed: boom');
  });
});
