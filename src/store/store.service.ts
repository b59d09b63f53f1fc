import { Inject, Injectable, OnModuleDestroy } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { WINSTON_MODULE_PROVIDER } from 'nest-winston';
import { Logger } from 'winston';
import { ConcurrencyConflictError } from '../common/errors';
import storeConfig from '../config/store.config';
import { StoreTransaction } from './store-transaction';
import { STORE_BACKEND, StoreBackend } from './store.types';

export type StoreRetryPolicy = Pick<ConfigType<typeof storeConfig>, 'conflictRetries' | 'conflictBackoffMs'>;

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

@Injectable()
export class StoreService implements OnModuleDestroy {
  constructor(
    @Inject(STORE_BACKEND) private readonly backend: StoreBackend,
    @Inject(storeConfig.KEY) private readonly retryPolicy: StoreRetryPolicy,
    @Inject(WINSTON_MODULE_PROVIDER) private readonly logger: Logger,
  ) {}

  /**
   * Runs `work` in a fresh transaction and commits it. A version conflict at
   * commit re-runs the whole unit of work from scratch, up to
   * `conflictRetries` times with linear backoff; after that the conflict is
   * surfaced to the caller.
   */
  async transaction<T>(work: (tx: StoreTransaction) => Promise<T>): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      const tx = new StoreTransaction(this.backend, new Date());
      try {
        const result = await work(tx);
        await tx.commit();
        tx.runCommitHooks();
        return result;
      } catch (err) {
        if (!(err instanceof ConcurrencyConflictError) || attempt > this.retryPolicy.conflictRetries) {
          throw err;
        }
        this.logger.debug('store_conflict_retry', { attempt, reason: err.message });
        await sleep(this.retryPolicy.conflictBackoffMs * attempt);
      }
    }
  }

  /** Read-only access outside a unit of work; nothing read here can be written back. */
  async read<T>(work: (tx: StoreTransaction) => Promise<T>): Promise<T> {
    return work(new StoreTransaction(this.backend, new Date()));
  }

  ping() {
    return this.backend.ping();
  }

  async onModuleDestroy() {
    await this.backend.close();
  }
}
