/**
 * Tests for UpdateSink demand accounting and the UpdateStream consumer API.
 */

import { describe, it, expect, vi, type Mock } from 'vitest';
import { QueryBusError, StreamAlreadyConsumedError } from '../../../core/errors.js';
import { QueryErrorCode } from '../../../types/error-codes.js';
import {
  DEFAULT_BACKPRESSURE,
  UpdateSink,
  UpdateStream,
  type UpdateSubscriber,
} from '../update-stream.js';

interface SubscriberSpy extends UpdateSubscriber<string> {
  next: Mock<(update: string) => void>;
  error: Mock<(error: unknown) => void>;
  complete: Mock<() => void>;
}

function subscriberSpy(): SubscriberSpy {
  return {
    next: vi.fn<(update: string) => void>(),
    error: vi.fn<(error: unknown) => void>(),
    complete: vi.fn<() => void>(),
  };
}

describe('UpdateSink', () => {
  it('delivers up to the requested demand and queues the rest', () => {
    const subscriber = subscriberSpy();
    const sink = new UpdateSink(subscriber, DEFAULT_BACKPRESSURE);

    sink.request(1);
    sink.next('a');
    sink.next('b');

    expect(subscriber.next.mock.calls).toEqual([['a']]);
    expect(sink.requestedFromDownstream()).toBe(0);

    sink.request(3);
    expect(subscriber.next.mock.calls).toEqual([['a'], ['b']]);
    expect(sink.requestedFromDownstream()).toBe(2);
  });

  it('distinguishes an undefined update from an empty queue', () => {
    const next = vi.fn();
    const sink = new UpdateSink<string | undefined>({ next, error: vi.fn(), complete: vi.fn() }, DEFAULT_BACKPRESSURE);

    sink.next(undefined);
    sink.request(1);

    expect(next).toHaveBeenCalledWith(undefined);
  });

  it('fails with INVALID_DEMAND on a non-positive request', () => {
    const subscriber = subscriberSpy();
    const sink = new UpdateSink(subscriber, DEFAULT_BACKPRESSURE);

    sink.request(0);

    const [error] = subscriber.error.mock.calls[0] ?? [];
    expect(error).toBeInstanceOf(QueryBusError);
    expect(error).toMatchObject({ code: QueryErrorCode.INVALID_DEMAND });
    expect(sink.disposed).toBe(true);
  });

  it('discards queued updates on fail()', () => {
    const subscriber = subscriberSpy();
    const sink = new UpdateSink(subscriber, DEFAULT_BACKPRESSURE);
    const failure = new Error('gone');

    sink.next('a');
    sink.fail(failure);
    sink.request(1);

    expect(subscriber.next).not.toHaveBeenCalled();
    expect(subscriber.error).toHaveBeenCalledWith(failure);
  });

  it('runs dispose hooks once, and immediately when already disposed', () => {
    const sink = new UpdateSink(subscriberSpy(), DEFAULT_BACKPRESSURE);
    const early = vi.fn();
    const late = vi.fn();

    sink.onDispose(early);
    sink.cancel();
    sink.cancel();
    sink.onDispose(late);

    expect(early).toHaveBeenCalledTimes(1);
    expect(late).toHaveBeenCalledTimes(1);
  });

  it('ignores signals after completion', () => {
    const subscriber = subscriberSpy();
    const sink = new UpdateSink(subscriber, DEFAULT_BACKPRESSURE);
    sink.request(Infinity);

    sink.complete();
    sink.next('late');
    sink.error(new Error('late'));

    expect(subscriber.complete).toHaveBeenCalledTimes(1);
    expect(subscriber.next).not.toHaveBeenCalled();
    expect(subscriber.error).not.toHaveBeenCalled();
  });
});

describe('UpdateStream', () => {
  it('attaches the sink with the initial demand already requested', () => {
    const attach = vi.fn((sink: UpdateSink<string>) => {
      sink.next('replayed');
    });
    const stream = new UpdateStream<string>('greeting', DEFAULT_BACKPRESSURE, attach);
    const subscriber = subscriberSpy();

    stream.subscribe(subscriber);

    expect(attach).toHaveBeenCalledTimes(1);
    expect(subscriber.next).toHaveBeenCalledWith('replayed');
  });

  it('rejects a second consumer', async () => {
    const stream = new UpdateStream<string>('greeting', DEFAULT_BACKPRESSURE, () => {});
    stream.subscribe(subscriberSpy());

    expect(() => stream.subscribe(subscriberSpy())).toThrow(StreamAlreadyConsumedError);
    await expect(stream[Symbol.asyncIterator]().next()).rejects.toThrow(
      'Update stream for greeting already has a consumer',
    );
  });

  it('requests one update per pending next()', async () => {
    const sinks: UpdateSink<string>[] = [];
    const stream = new UpdateStream<string>('greeting', DEFAULT_BACKPRESSURE, (sink) => {
      sinks.push(sink);
    });
    const iterator = stream[Symbol.asyncIterator]();

    const first = iterator.next();
    const [sink] = sinks;
    expect(sink?.requestedFromDownstream()).toBe(1);
    sink?.next('hello');
    expect(await first).toEqual({ value: 'hello', done: false });
    expect(sink?.requestedFromDownstream()).toBe(0);

    const second = iterator.next();
    sink?.complete();
    expect(await second).toEqual({ value: undefined, done: true });
    expect(await iterator.next()).toEqual({ value: undefined, done: true });
  });
});
