/**
 * Run one service operation as a unit of work with its own outbox.
 * Notifications are published only after the commit succeeded; a run
 * that is retried starts over with an empty outbox.
 */

import { AppError } from '../errors.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { IUnitOfWork, RunOptions, TransactionScope } from '../repositories/ITransaction.js';
import { Outbox } from './NotificationDispatcher.js';
import type { NotificationDispatcher } from './NotificationDispatcher.js';

export interface TransactDeps {
  uow: IUnitOfWork;
  notifier: NotificationDispatcher;
  logProvider?: ILogProvider;
}

export async function transact<T>(
  deps: TransactDeps,
  operation: string,
  work: (tx: TransactionScope, outbox: Outbox) => Promise<T>,
  options?: RunOptions
): Promise<T> {
  try {
    const { result, outbox } = await deps.uow.run(async (tx) => {
      const outbox = new Outbox();
      const result = await work(tx, outbox);
      return { result, outbox };
    }, options);

    deps.notifier.publish(outbox.notifications);
    return result;
  } catch (err) {
    if (err instanceof AppError && err.category === 'integrity') {
      deps.logProvider?.error(err.message, { operation, code: err.code, ...err.details });
    }
    throw err;
  }
}
