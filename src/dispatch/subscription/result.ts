/**
 * Result of a subscription query: a lazily computed initial result plus the
 * query's update stream.
 */

import type { QueryResponseMessage } from '../messages.js';
import type { UpdateStream } from './update-stream.js';

export interface SubscriptionQueryResult<I, U> {
  /**
   * The initial result. Handlers run on the first call; later calls return
   * the same promise.
   */
  initialResult(): Promise<QueryResponseMessage<I>>;
  /** The update stream. Accepts a single consumer. */
  updates(): UpdateStream<U>;
  /**
   * Consume both sides: `onInitial` with the initial payload, then
   * `onUpdate` for every update until the stream ends. Resolves when the
   * stream completes; rejects (after closing the session) on failure.
   */
  handle(
    onInitial: (initial: I) => void | Promise<void>,
    onUpdate: (update: U) => void | Promise<void>,
  ): Promise<void>;
  /** Detach the consumer, or drop the session if nobody is attached yet. */
  close(): void;
}

export class DefaultSubscriptionQueryResult<I, U> implements SubscriptionQueryResult<I, U> {
  private initial: Promise<QueryResponseMessage<I>> | null = null;

  constructor(
    private readonly computeInitial: () => Promise<QueryResponseMessage<I>>,
    private readonly updateStream: UpdateStream<U>,
    private readonly closeSession: () => void,
  ) {}

  initialResult(): Promise<QueryResponseMessage<I>> {
    this.initial ??= this.computeInitial();
    return this.initial;
  }

  updates(): UpdateStream<U> {
    return this.updateStream;
  }

  async handle(
    onInitial: (initial: I) => void | Promise<void>,
    onUpdate: (update: U) => void | Promise<void>,
  ): Promise<void> {
    try {
      const initial = await this.initialResult();
      await onInitial(initial.payload);
      for await (const update of this.updateStream) {
        await onUpdate(update);
      }
    } catch (err) {
      this.close();
      throw err;
    }
  }

  close(): void {
    this.closeSession();
  }
}
