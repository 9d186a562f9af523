/**
 * Unit of work over a transaction backend.
 * Each run stages its writes, then commits them as one version-checked
 * changeset. A commit that loses a race is discarded and the run is
 * re-executed against fresh reads, a bounded number of times.
 *
 * The deadline covers the work and is checked once more before the
 * changeset is sent. A commit in flight is awaited to completion, so
 * DEADLINE_EXCEEDED always means nothing was written.
 */

import { TransientError, WriteConflictError } from '../errors.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { ITransactionBackend } from './ITransactionBackend.js';
import { isEmptyChangeset } from './ITransactionBackend.js';
import type { IUnitOfWork, RunOptions, TransactionScope } from './ITransaction.js';
import { StagedTransaction } from './StagedTransaction.js';

export interface UnitOfWorkOptions {
  /** Default deadline per run. Default: 5000ms. */
  timeoutMs?: number;
  /** Attempts before a conflicting run gives up. Default: 5. */
  maxAttempts?: number;
  clock?: () => Date;
  logProvider?: ILogProvider;
}

function deadlineExceeded(timeoutMs: number): TransientError {
  return new TransientError(
    'DEADLINE_EXCEEDED',
    `Transaction did not complete within ${timeoutMs}ms`,
    { timeoutMs }
  );
}

/** Settle with `promise`, or reject as soon as `signal` aborts. */
function withDeadline<T>(promise: Promise<T>, signal: AbortSignal, timeoutMs: number): Promise<T> {
  if (signal.aborted) return Promise.reject(deadlineExceeded(timeoutMs));

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(deadlineExceeded(timeoutMs));
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      }
    );
  });
}

export class UnitOfWork implements IUnitOfWork {
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly clock: () => Date;

  constructor(
    private readonly backend: ITransactionBackend,
    private readonly options: UnitOfWorkOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? 5_000;
    this.maxAttempts = options.maxAttempts ?? 5;
    this.clock = options.clock ?? (() => new Date());
  }

  async run<T>(
    work: (tx: TransactionScope) => Promise<T>,
    runOptions?: RunOptions
  ): Promise<T> {
    const timeoutMs = runOptions?.timeoutMs ?? this.timeoutMs;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    try {
      for (let attempt = 1; ; attempt++) {
        const tx = new StagedTransaction(this.backend.reader(controller.signal), this.clock);
        const result = await withDeadline(work(tx), controller.signal, timeoutMs);
        const changeset = tx.changeset();

        if (isEmptyChangeset(changeset)) return result;
        if (controller.signal.aborted) throw deadlineExceeded(timeoutMs);

        try {
          await this.backend.commit(changeset);
          return result;
        } catch (err) {
          if (!(err instanceof WriteConflictError)) throw err;

          if (attempt >= this.maxAttempts) {
            throw new TransientError(
              'CONCURRENT_MODIFICATION',
              'Transaction kept conflicting with concurrent writes',
              { attempts: attempt, conflict: err.message }
            );
          }

          this.options.logProvider?.debug('Transaction conflict, re-running', {
            attempt,
            conflict: err.message,
          });
        }
      }
    } finally {
      clearTimeout(timer);
    }
  }
}
