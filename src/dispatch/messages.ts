/**
 * Immutable message envelopes carried by the query bus.
 *
 * Messages have per-instance identity: two messages with equal content are
 * different queries, and subscription query sessions are keyed by instance.
 */

import { randomUUID } from 'node:crypto';
import type { ResponseType } from './response-types.js';

export type MetaData = Readonly<Record<string, unknown>>;

export interface QueryMessage<P, R> {
  readonly identifier: string;
  readonly queryName: string;
  readonly payload: P;
  readonly responseType: ResponseType<R>;
  readonly metaData: MetaData;
  /** Copy of this message (new identity) with `extra` merged into its metadata. */
  andMetaData(extra: Record<string, unknown>): QueryMessage<P, R>;
}

export interface SubscriptionQueryMessage<P, I, U> extends QueryMessage<P, I> {
  readonly updateResponseType: ResponseType<U>;
  andMetaData(extra: Record<string, unknown>): SubscriptionQueryMessage<P, I, U>;
}

export interface QueryResponseMessage<R> {
  readonly payload: R;
  readonly metaData: MetaData;
}

export interface SubscriptionQueryUpdateMessage<U> {
  readonly identifier: string;
  readonly payload: U;
  readonly metaData: MetaData;
}

/**
 * Name used when a query is created without an explicit name: the payload's
 * class name, as in `new FindBook(...)` → `FindBook`.
 */
export function defaultQueryName(payload: unknown): string {
  if (payload !== null && payload !== undefined) {
    const ctor: unknown = Object.getPrototypeOf(payload)?.constructor;
    if (typeof ctor === 'function' && ctor.name) {
      return ctor.name;
    }
  }
  return String(payload);
}

export class GenericQueryMessage<P, R> implements QueryMessage<P, R> {
  readonly identifier: string = randomUUID();

  constructor(
    readonly queryName: string,
    readonly payload: P,
    readonly responseType: ResponseType<R>,
    readonly metaData: MetaData = {},
  ) {}

  andMetaData(extra: Record<string, unknown>): GenericQueryMessage<P, R> {
    return new GenericQueryMessage(this.queryName, this.payload, this.responseType, {
      ...this.metaData,
      ...extra,
    });
  }

  toString(): string {
    return `QueryMessage{${this.queryName}, ${this.identifier}}`;
  }
}

export class GenericSubscriptionQueryMessage<P, I, U>
  extends GenericQueryMessage<P, I>
  implements SubscriptionQueryMessage<P, I, U>
{
  constructor(
    queryName: string,
    payload: P,
    responseType: ResponseType<I>,
    readonly updateResponseType: ResponseType<U>,
    metaData: MetaData = {},
  ) {
    super(queryName, payload, responseType, metaData);
  }

  override andMetaData(extra: Record<string, unknown>): GenericSubscriptionQueryMessage<P, I, U> {
    return new GenericSubscriptionQueryMessage(
      this.queryName,
      this.payload,
      this.responseType,
      this.updateResponseType,
      { ...this.metaData, ...extra },
    );
  }

  override toString(): string {
    return `SubscriptionQueryMessage{${this.queryName}, ${this.identifier}}`;
  }
}

export class GenericSubscriptionQueryUpdateMessage<U> implements SubscriptionQueryUpdateMessage<U> {
  readonly identifier: string = randomUUID();

  constructor(
    readonly payload: U,
    readonly metaData: MetaData = {},
  ) {}
}

export function createQueryMessage<P, R>(
  payload: P,
  responseType: ResponseType<R>,
  queryName: string = defaultQueryName(payload),
  metaData?: MetaData,
): QueryMessage<P, R> {
  return new GenericQueryMessage(queryName, payload, responseType, metaData);
}

export function createSubscriptionQueryMessage<P, I, U>(
  payload: P,
  initialResponseType: ResponseType<I>,
  updateResponseType: ResponseType<U>,
  queryName: string = defaultQueryName(payload),
  metaData?: MetaData,
): SubscriptionQueryMessage<P, I, U> {
  return new GenericSubscriptionQueryMessage(
    queryName,
    payload,
    initialResponseType,
    updateResponseType,
    metaData,
  );
}

export function createResponseMessage<R>(payload: R, metaData: MetaData = {}): QueryResponseMessage<R> {
  return { payload, metaData };
}

/**
 * Build an update message carrying `metaData`. Emitters recognise messages
 * built here (or with `new GenericSubscriptionQueryUpdateMessage`); any other
 * value, including a plain object shaped like an update message, is treated
 * as the payload.
 */
export function createUpdateMessage<U>(
  payload: U,
  metaData: MetaData = {},
): SubscriptionQueryUpdateMessage<U> {
  return new GenericSubscriptionQueryUpdateMessage(payload, metaData);
}

/** Wrap a bare payload into an update message; update messages pass through. */
export function asUpdateMessage(update: unknown): SubscriptionQueryUpdateMessage<unknown> {
  if (update instanceof GenericSubscriptionQueryUpdateMessage) {
    return update;
  }
  return new GenericSubscriptionQueryUpdateMessage(update);
}
