/**
 * Query Gateway -- payload-level facade over a QueryBus.
 *
 * Builds the message envelopes and unwraps response messages so callers deal
 * in payloads only.
 */

import { createQueryMessage, createSubscriptionQueryMessage, type MetaData } from './messages.js';
import type { QueryBus } from './query-bus.js';
import type { ResponseType } from './response-types.js';
import type { SubscriptionQueryResult } from './subscription/result.js';
import type { SubscriptionQueryBackpressure } from './subscription/update-stream.js';
import type { TimeUnit } from './types.js';

export interface QueryGateway {
  query<P, R>(queryName: string, payload: P, responseType: ResponseType<R>, metaData?: MetaData): Promise<R>;
  scatterGather<P, R>(
    queryName: string,
    payload: P,
    responseType: ResponseType<R>,
    timeout: number,
    unit?: TimeUnit,
  ): AsyncIterable<R>;
  subscriptionQuery<P, I, U>(
    queryName: string,
    payload: P,
    initialResponseType: ResponseType<I>,
    updateResponseType: ResponseType<U>,
    backpressure?: SubscriptionQueryBackpressure,
  ): SubscriptionQueryResult<I, U>;
}

export class DefaultQueryGateway implements QueryGateway {
  constructor(private readonly queryBus: QueryBus) {}

  async query<P, R>(
    queryName: string,
    payload: P,
    responseType: ResponseType<R>,
    metaData?: MetaData,
  ): Promise<R> {
    const response = await this.queryBus.query(
      createQueryMessage(payload, responseType, queryName, metaData),
    );
    return response.payload;
  }

  async *scatterGather<P, R>(
    queryName: string,
    payload: P,
    responseType: ResponseType<R>,
    timeout: number,
    unit: TimeUnit = 'milliseconds',
  ): AsyncIterable<R> {
    const responses = this.queryBus.scatterGather(
      createQueryMessage(payload, responseType, queryName),
      timeout,
      unit,
    );
    for await (const response of responses) {
      yield response.payload;
    }
  }

  subscriptionQuery<P, I, U>(
    queryName: string,
    payload: P,
    initialResponseType: ResponseType<I>,
    updateResponseType: ResponseType<U>,
    backpressure?: SubscriptionQueryBackpressure,
  ): SubscriptionQueryResult<I, U> {
    return this.queryBus.subscriptionQuery(
      createSubscriptionQueryMessage(payload, initialResponseType, updateResponseType, queryName),
      backpressure,
    );
  }
}
