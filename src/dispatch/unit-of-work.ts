/**
 * Unit of work: the per-attempt scope every handler invocation runs in.
 *
 * A fresh unit is started for each handler attempt and never shared across
 * candidates or calls. Interceptors attach commit/rollback behaviour to it
 * (see middleware/transaction.ts).
 */

export type UnitOfWorkPhase = 'started' | 'committed' | 'rolled_back' | 'cleaned_up';

type PhaseHook<M> = (unitOfWork: UnitOfWork<M>) => void | Promise<void>;
type RollbackHook<M> = (unitOfWork: UnitOfWork<M>, error: unknown) => void | Promise<void>;

export interface UnitOfWork<M> {
  readonly message: M;
  readonly phase: UnitOfWorkPhase;
  /** Attempt-scoped resources shared between interceptors and the handler. */
  readonly resources: Map<string, unknown>;
  onCommit(hook: PhaseHook<M>): void;
  afterCommit(hook: PhaseHook<M>): void;
  onRollback(hook: RollbackHook<M>): void;
  onCleanup(hook: PhaseHook<M>): void;
  /**
   * Run `task` inside this unit. Commits when it resolves, rolls back and
   * rethrows when it rejects, cleans up either way.
   */
  executeWithResult<T>(task: () => Promise<T>): Promise<T>;
}

/** Starts the unit of work for one handler attempt. */
export interface UnitOfWorkFactory {
  start<M>(message: M): UnitOfWork<M>;
}

export class DefaultUnitOfWork<M> implements UnitOfWork<M> {
  readonly resources = new Map<string, unknown>();
  private currentPhase: UnitOfWorkPhase = 'started';
  private readonly commitHooks: PhaseHook<M>[] = [];
  private readonly afterCommitHooks: PhaseHook<M>[] = [];
  private readonly rollbackHooks: RollbackHook<M>[] = [];
  private readonly cleanupHooks: PhaseHook<M>[] = [];

  private constructor(readonly message: M) {}

  static startAndGet<M>(message: M): DefaultUnitOfWork<M> {
    return new DefaultUnitOfWork(message);
  }

  get phase(): UnitOfWorkPhase {
    return this.currentPhase;
  }

  onCommit(hook: PhaseHook<M>): void {
    this.commitHooks.push(hook);
  }

  afterCommit(hook: PhaseHook<M>): void {
    this.afterCommitHooks.push(hook);
  }

  onRollback(hook: RollbackHook<M>): void {
    this.rollbackHooks.push(hook);
  }

  onCleanup(hook: PhaseHook<M>): void {
    this.cleanupHooks.push(hook);
  }

  async executeWithResult<T>(task: () => Promise<T>): Promise<T> {
    if (this.currentPhase !== 'started') {
      throw new Error(`Unit of work cannot execute in phase ${this.currentPhase}`);
    }
    try {
      let result: T;
      try {
        result = await task();
        for (const hook of this.commitHooks) await hook(this);
      } catch (err) {
        await this.rollback(err);
        throw err;
      }
      this.currentPhase = 'committed';
      for (const hook of this.afterCommitHooks) await hook(this);
      return result;
    } finally {
      await this.cleanup();
    }
  }

  private async rollback(error: unknown): Promise<void> {
    this.currentPhase = 'rolled_back';
    // Hooks run in reverse registration order, innermost resource first.
    for (const hook of [...this.rollbackHooks].reverse()) {
      await hook(this, error);
    }
  }

  private async cleanup(): Promise<void> {
    for (const hook of [...this.cleanupHooks].reverse()) {
      await hook(this);
    }
    this.currentPhase = 'cleaned_up';
  }
}

export const defaultUnitOfWorkFactory: UnitOfWorkFactory = {
  start: (message) => DefaultUnitOfWork.startAndGet(message),
};
