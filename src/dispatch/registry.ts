/**
 * Subscription Registry -- query name → ordered (declared type, handler) list.
 *
 * Registration order is routing order: it decides both direct-dispatch
 * fallback order and scatter-gather iteration order. Lookups return a
 * snapshot, so cancelling a registration never affects a dispatch that is
 * already iterating its candidates.
 */

import type { QueryMessage } from './messages.js';
import { sameDeclaredType, type DeclaredType } from './response-types.js';
import type { QueryHandler, Registration } from './types.js';

export interface QuerySubscription {
  readonly queryName: string;
  readonly declaredType: DeclaredType;
  readonly handler: QueryHandler;
}

export class SubscriptionRegistry {
  private subscriptionsByName = new Map<string, QuerySubscription[]>();

  /**
   * Register `handler` for `queryName`. Registering the same handler twice
   * under the same name and declared type keeps a single entry.
   */
  subscribe(queryName: string, declaredType: DeclaredType, handler: QueryHandler): Registration {
    let list = this.subscriptionsByName.get(queryName);
    if (!list) {
      list = [];
      this.subscriptionsByName.set(queryName, list);
    }
    const existing = list.find(
      (s) => s.handler === handler && sameDeclaredType(s.declaredType, declaredType),
    );
    const subscription = existing ?? { queryName, declaredType, handler };
    if (!existing) {
      list.push(subscription);
    }
    return { cancel: () => this.unsubscribe(subscription) };
  }

  /**
   * Candidates for `message`, in registration order, filtered to those whose
   * declared type the message's response type accepts.
   */
  handlersFor(message: QueryMessage<unknown, unknown>): QuerySubscription[] {
    const list = this.subscriptionsByName.get(message.queryName);
    if (!list) return [];
    return list.filter((s) => message.responseType.matches(s.declaredType));
  }

  /** Read-only view of every registration, keyed by query name. */
  subscriptions(): ReadonlyMap<string, readonly QuerySubscription[]> {
    return new Map(
      Array.from(this.subscriptionsByName, ([name, list]) => [name, [...list]] as const),
    );
  }

  private unsubscribe(subscription: QuerySubscription): boolean {
    const list = this.subscriptionsByName.get(subscription.queryName);
    if (!list) return false;
    const index = list.indexOf(subscription);
    if (index === -1) return false;
    list.splice(index, 1);
    if (list.length === 0) {
      this.subscriptionsByName.delete(subscription.queryName);
    }
    return true;
  }
}
