/**
 * Transaction-managing handler interceptor.
 *
 * Starts a transaction for every handler attempt and ties it to the
 * attempt's unit of work: committed when the unit commits, rolled back when
 * it rolls back (including after a decline).
 */

import type { HandlerInterceptor } from '../types.js';

export interface Transaction {
  commit(): void | Promise<void>;
  rollback(): void | Promise<void>;
}

export interface TransactionManager {
  startTransaction(): Transaction;
}

/** Key under which the active transaction is stored in the unit of work's resources. */
export const TRANSACTION_RESOURCE = 'transaction';

export function createTransactionInterceptor(manager: TransactionManager): HandlerInterceptor {
  return async (unitOfWork, next) => {
    const transaction = manager.startTransaction();
    unitOfWork.resources.set(TRANSACTION_RESOURCE, transaction);
    unitOfWork.onCommit(() => transaction.commit());
    unitOfWork.onRollback(() => transaction.rollback());
    return next();
  };
}
