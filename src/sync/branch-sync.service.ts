import { Inject, Injectable } from '@nestjs/common';
import { WINSTON_MODULE_PROVIDER } from 'nest-winston';
import { Logger } from 'winston';
import { NotFoundError, ValidationError } from '../common/errors';
import { StoreService } from '../store/store.service';
import { StockMovement, StockRecord, stockKey } from '../stock/stock.types';
import { foldMovement } from './fold-movement';
import { SYNC_CHANNEL, SyncChannel, syncCursorKey } from './sync.types';

const FLUSH_BATCH_SIZE = 100;

@Injectable()
export class BranchSyncService {
  private readonly flushes = new Map<string, Promise<number>>();
  private readonly connectedAs = new Set<string>();

  constructor(
    private readonly store: StoreService,
    @Inject(SYNC_CHANNEL) private readonly channel: SyncChannel,
    @Inject(WINSTON_MODULE_PROVIDER) private readonly logger: Logger,
  ) {}

  /** Receive other branches' movements on this node. */
  connect(replicaId: string) {
    this.connectedAs.add(replicaId);
    this.channel.subscribe(replicaId, async (originBranchId, movement) => {
      await this.applyRemote(movement, originBranchId);
    });
  }

  /** Called after a local commit. Never awaited by the write path; a failed flush is retried by the next one. */
  schedule(branchId: string) {
    void this.flush(branchId).catch((err: unknown) => {
      this.logger.warn('sync_flush_failed', {
        branchId,
        error: err instanceof Error ? err.message : String(err),
      });
    });
  }

  /**
   * Publishes everything after each replica's cursor in sequence order.
   * Flushes of one branch run one after another; a cursor moves only after
   * its replica accepted a batch, so a crash in between redelivers it.
   */
  flush(branchId: string): Promise<number> {
    const previous = this.flushes.get(branchId) ?? Promise.resolve(0);
    const next = previous.catch(() => 0).then(() => this.publishPending(branchId));
    this.flushes.set(branchId, next);

    const settle = () => {
      if (this.flushes.get(branchId) === next) this.flushes.delete(branchId);
    };
    void next.then(settle, settle);
    return next;
  }

  /** Resolves once every flush started so far has finished. */
  async idle(): Promise<void> {
    while (this.flushes.size > 0) {
      await Promise.allSettled([...this.flushes.values()]);
    }
  }

  /**
   * Folds a movement from another branch into this node's replica of that
   * branch. Movements must arrive in sequence: a redelivered one is a no-op,
   * a gap is refused, and so is a fold that would break 0 <= reserved <= onHand.
   */
  async applyRemote(movement: StockMovement, originBranchId: string): Promise<boolean> {
    if (movement.branchId !== originBranchId) {
      throw new ValidationError(
        `Movement ${movement.id} belongs to branch ${movement.branchId}, not ${originBranchId}`,
      );
    }

    const applied = await this.store.transaction(async (tx) => {
      const cursor = await tx.get('replicaCursor', originBranchId);
      const last = cursor?.lastAppliedSequence ?? 0;
      if (movement.sequence <= last) {
        return false;
      }
      if (movement.sequence !== last + 1) {
        throw new ValidationError(`Movement ${movement.id} from ${originBranchId} is out of sequence`, [
          { field: 'sequence', message: `expected ${last + 1}, got ${movement.sequence}` },
        ]);
      }

      const key = stockKey(movement.variantId, originBranchId);
      const current: StockRecord = (await tx.get('replica', key)) ?? {
        variantId: movement.variantId,
        branchId: originBranchId,
        onHand: 0,
        reserved: 0,
        version: 0,
        updatedAt: tx.now,
      };
      const folded = foldMovement(current, movement);
      if (folded.onHand < 0 || folded.reserved < 0 || folded.reserved > folded.onHand) {
        throw new ValidationError(
          `Movement ${movement.id} would leave ${key} at onHand ${folded.onHand}, reserved ${folded.reserved}`,
        );
      }
      tx.put('replica', key, {
        ...current,
        ...folded,
        version: current.version + 1,
        updatedAt: tx.now,
      });
      tx.put('replicaCursor', originBranchId, {
        originBranchId,
        lastAppliedSequence: movement.sequence,
        updatedAt: tx.now,
      });
      return true;
    });

    this.logger.debug(applied ? 'sync_remote_applied' : 'sync_remote_duplicate', {
      movementId: movement.id,
      originBranchId,
      sequence: movement.sequence,
    });
    return applied;
  }

  /** This node's copy of another branch's stock record. */
  async getReplica(variantId: string, originBranchId: string): Promise<StockRecord> {
    const record = await this.store.read((tx) => tx.get('replica', stockKey(variantId, originBranchId)));
    if (!record) {
      throw new NotFoundError(`No replica of variant ${variantId} from branch ${originBranchId}`);
    }
    return record;
  }

  /** Delivers to every connected replica from its own cursor; one unreachable replica does not hold back the rest. */
  private async publishPending(branchId: string): Promise<number> {
    let published = 0;
    const failures: unknown[] = [];
    for (const replicaId of this.channel.replicas()) {
      if (replicaId === branchId || this.connectedAs.has(replicaId)) continue;
      try {
        published += await this.publishTo(branchId, replicaId);
      } catch (err) {
        failures.push(err);
      }
    }
    if (failures.length > 0) {
      throw failures[0];
    }
    return published;
  }

  private async publishTo(branchId: string, replicaId: string): Promise<number> {
    const key = syncCursorKey(branchId, replicaId);
    let published = 0;
    for (;;) {
      const cursor = await this.store.read((tx) => tx.get('syncCursor', key));
      const after = cursor?.lastPublishedSequence ?? 0;
      const batch = await this.store.read((tx) => tx.readLog('movement', branchId, after, FLUSH_BATCH_SIZE));
      if (batch.length === 0) {
        return published;
      }

      await this.channel.deliver(
        replicaId,
        branchId,
        batch.map((e) => e.entry),
      );

      const last = batch[batch.length - 1].sequence;
      await this.store.transaction(async (tx) => {
        const current = await tx.get('syncCursor', key);
        if ((current?.lastPublishedSequence ?? 0) >= last) return;
        tx.put('syncCursor', key, { branchId, replicaId, lastPublishedSequence: last, updatedAt: tx.now });
      });
      published += batch.length;
      this.logger.debug('sync_published', { branchId, replicaId, through: last, count: batch.length });
    }
  }
}
