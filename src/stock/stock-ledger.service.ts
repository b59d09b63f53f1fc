import { Inject, Injectable } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import { AlertsService } from '../alerts/alerts.service';
import { OperationContext } from '../commands/operation-context';
import {
  InsufficientStockError,
  InvalidStateTransitionError,
  NotFoundError,
  ValidationError,
  requirePositiveQuantity,
} from '../common/errors';
import ledgerConfig from '../config/ledger.config';
import { StoreService } from '../store/store.service';
import { StoreTransaction } from '../store/store-transaction';
import { BranchSyncService } from '../sync/branch-sync.service';
import {
  MovementKind,
  Reservation,
  ReserveOptions,
  StockMovement,
  StockRecord,
  availableQuantity,
  stockKey,
} from './stock.types';

export type LedgerSettings = Pick<ConfigType<typeof ledgerConfig>, 'reservationTtlMinutes'>;

type MovementDraft = {
  kind: MovementKind;
  delta: number;
  reference: string;
  reason: string | null;
};

function requireText(field: string, value: string) {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ValidationError(`${field} is required`, [{ field, message: 'must not be empty' }]);
  }
}

/**
 * Sole writer of StockRecords. Each mutation reads the (variant, branch)
 * record, checks it, writes it back against the version it read and appends
 * the matching movement to the branch log. The `*In` variants join a caller's
 * transaction so a multi-line workflow commits or fails as a whole.
 */
@Injectable()
export class StockLedgerService {
  constructor(
    private readonly store: StoreService,
    private readonly alerts: AlertsService,
    private readonly sync: BranchSyncService,
    @Inject(ledgerConfig.KEY) private readonly settings: LedgerSettings,
  ) {}

  reserve(
    ctx: OperationContext,
    variantId: string,
    branchId: string,
    quantity: number,
    ref: string,
    options: ReserveOptions = {},
  ): Promise<StockRecord> {
    return this.store.transaction((tx) => this.reserveIn(tx, ctx, variantId, branchId, quantity, ref, options));
  }

  /** Standalone release; reservations owned by a document settle only through that document. */
  release(ctx: OperationContext, ref: string): Promise<StockRecord> {
    return this.store.transaction(async (tx) => {
      await this.requireStandalone(tx, ref, 'RELEASED');
      return this.releaseIn(tx, ctx, ref);
    });
  }

  deduct(ctx: OperationContext, ref: string): Promise<StockRecord> {
    return this.store.transaction(async (tx) => {
      await this.requireStandalone(tx, ref, 'DEDUCTED');
      return this.deductIn(tx, ctx, ref);
    });
  }

  replenish(ctx: OperationContext, variantId: string, branchId: string, quantity: number, ref: string) {
    return this.store.transaction((tx) => this.replenishIn(tx, ctx, variantId, branchId, quantity, ref));
  }

  adjust(ctx: OperationContext, variantId: string, branchId: string, delta: number, reason: string) {
    return this.store.transaction((tx) => this.adjustIn(tx, ctx, variantId, branchId, delta, reason));
  }

  /** Moves stock between branches in one transaction; returns [source, destination]. */
  async transfer(
    ctx: OperationContext,
    variantId: string,
    fromBranchId: string,
    toBranchId: string,
    quantity: number,
    ref: string,
  ): Promise<[StockRecord, StockRecord]> {
    requirePositiveQuantity('quantity', quantity);
    requireText('ref', ref);
    if (fromBranchId === toBranchId) {
      throw new ValidationError('Source and destination branch must differ', [
        { field: 'toBranchId', message: 'must differ from fromBranchId' },
      ]);
    }

    return this.store.transaction(async (tx): Promise<[StockRecord, StockRecord]> => {
      const source = await this.adjustIn(tx, ctx, variantId, fromBranchId, -quantity, `transfer:${ref}`);
      const destination = await this.replenishIn(tx, ctx, variantId, toBranchId, quantity, ref);
      return [source, destination];
    });
  }

  async reserveIn(
    tx: StoreTransaction,
    ctx: OperationContext,
    variantId: string,
    branchId: string,
    quantity: number,
    ref: string,
    options: ReserveOptions = {},
  ): Promise<StockRecord> {
    requirePositiveQuantity('quantity', quantity);
    requireText('ref', ref);

    // Replaying a ref is a no-op, but only for the same request
    const existing = await tx.get('reservation', ref);
    if (existing) {
      const mismatched: string[] = [];
      if (existing.variantId !== variantId) mismatched.push('variantId');
      if (existing.branchId !== branchId) mismatched.push('branchId');
      if (existing.quantity !== quantity) mismatched.push('quantity');
      if (existing.documentId !== (options.documentId ?? null)) mismatched.push('documentId');
      if (mismatched.length > 0) {
        throw new ValidationError(
          `Reservation ref ${ref} is already used for a different request`,
          mismatched.map((field) => ({ field, message: 'differs from the existing reservation' })),
        );
      }
      ctx.logger.debug('reservation_replayed', { ref, status: existing.status });
      return this.loadRecord(tx, existing.variantId, existing.branchId);
    }

    const record = await this.loadRecord(tx, variantId, branchId);
    const available = availableQuantity(record);
    if (available < quantity) {
      throw new InsufficientStockError(variantId, branchId, available, quantity);
    }

    const ttlMinutes = options.ttlMinutes ?? this.settings.reservationTtlMinutes;
    const reservation: Reservation = {
      ref,
      variantId,
      branchId,
      quantity,
      status: 'HELD',
      documentId: options.documentId ?? null,
      expiresAt: ttlMinutes > 0 ? new Date(tx.startedAt.getTime() + ttlMinutes * 60_000).toISOString() : null,
      createdAt: tx.now,
      settledAt: null,
    };
    tx.put('reservation', ref, reservation);
    if (reservation.expiresAt !== null) {
      tx.put('reservationExpiry', ref, { ref, expiresAt: reservation.expiresAt });
    }

    return this.apply(tx, ctx, record, { onHand: record.onHand, reserved: record.reserved + quantity }, {
      kind: 'reserve',
      delta: quantity,
      reference: ref,
      reason: null,
    });
  }

  async releaseIn(tx: StoreTransaction, ctx: OperationContext, ref: string): Promise<StockRecord> {
    const reservation = await this.heldReservation(tx, ref);
    const record = await this.loadRecord(tx, reservation.variantId, reservation.branchId);

    tx.put('reservation', ref, { ...reservation, status: 'RELEASED', settledAt: tx.now });
    await this.clearExpiry(tx, reservation);
    return this.apply(
      tx,
      ctx,
      record,
      { onHand: record.onHand, reserved: record.reserved - reservation.quantity },
      { kind: 'release', delta: -reservation.quantity, reference: ref, reason: null },
    );
  }

  async deductIn(tx: StoreTransaction, ctx: OperationContext, ref: string): Promise<StockRecord> {
    const reservation = await this.heldReservation(tx, ref);
    const record = await this.loadRecord(tx, reservation.variantId, reservation.branchId);

    tx.put('reservation', ref, { ...reservation, status: 'DEDUCTED', settledAt: tx.now });
    await this.clearExpiry(tx, reservation);
    return this.apply(
      tx,
      ctx,
      record,
      { onHand: record.onHand - reservation.quantity, reserved: record.reserved - reservation.quantity },
      { kind: 'deduct', delta: -reservation.quantity, reference: ref, reason: null },
    );
  }

  async replenishIn(
    tx: StoreTransaction,
    ctx: OperationContext,
    variantId: string,
    branchId: string,
    quantity: number,
    ref: string,
  ): Promise<StockRecord> {
    requirePositiveQuantity('quantity', quantity);
    requireText('ref', ref);

    const record = await this.loadRecord(tx, variantId, branchId);
    return this.apply(tx, ctx, record, { onHand: record.onHand + quantity, reserved: record.reserved }, {
      kind: 'replenish',
      delta: quantity,
      reference: ref,
      reason: null,
    });
  }

  async adjustIn(
    tx: StoreTransaction,
    ctx: OperationContext,
    variantId: string,
    branchId: string,
    delta: number,
    reason: string,
  ): Promise<StockRecord> {
    if (!Number.isSafeInteger(delta) || delta === 0) {
      throw new ValidationError('delta must be a non-zero integer', [
        { field: 'delta', message: 'must be a non-zero integer' },
      ]);
    }
    requireText('reason', reason);

    const record = await this.loadRecord(tx, variantId, branchId);
    if (record.onHand + delta < record.reserved) {
      throw new InsufficientStockError(variantId, branchId, availableQuantity(record), -delta);
    }
    return this.apply(tx, ctx, record, { onHand: record.onHand + delta, reserved: record.reserved }, {
      kind: 'adjustment',
      delta,
      reference: reason,
      reason,
    });
  }

  async getRecord(variantId: string, branchId: string): Promise<StockRecord> {
    const record = await this.store.read((tx) => tx.get('stock', stockKey(variantId, branchId)));
    if (!record) {
      throw new NotFoundError(`No stock record for variant ${variantId} at branch ${branchId}`);
    }
    return record;
  }

  async listMovements(branchId: string, afterSequence = 0, limit = 100): Promise<StockMovement[]> {
    const entries = await this.store.read((tx) => tx.readLog('movement', branchId, afterSequence, limit));
    return entries.map((e) => e.entry);
  }

  async getReservation(ref: string): Promise<Reservation> {
    const reservation = await this.store.read((tx) => tx.get('reservation', ref));
    if (!reservation) throw new NotFoundError(`Reservation ${ref} not found`);
    return reservation;
  }

  /** Reads the expiry index, which only holds HELD reservations that carry an expiry. */
  async listExpiredReservations(now: Date): Promise<Reservation[]> {
    const cutoff = now.toISOString();
    return this.store.read(async (tx) => {
      const due = (await tx.list('reservationExpiry')).filter((entry) => entry.expiresAt <= cutoff);
      const expired: Reservation[] = [];
      for (const entry of due) {
        const reservation = await tx.get('reservation', entry.ref);
        if (reservation?.status === 'HELD') {
          expired.push(reservation);
        }
      }
      return expired;
    });
  }

  private async requireStandalone(tx: StoreTransaction, ref: string, to: string) {
    const reservation = await tx.get('reservation', ref);
    if (reservation?.documentId) {
      throw new InvalidStateTransitionError(
        `Reservation ${ref} of document ${reservation.documentId}`,
        reservation.status,
        to,
      );
    }
  }

  private async clearExpiry(tx: StoreTransaction, reservation: Reservation) {
    if (reservation.expiresAt === null) {
      return;
    }
    await tx.get('reservationExpiry', reservation.ref);
    tx.remove('reservationExpiry', reservation.ref);
  }

  private async heldReservation(tx: StoreTransaction, ref: string): Promise<Reservation> {
    requireText('ref', ref);
    const reservation = await tx.get('reservation', ref);
    if (!reservation || reservation.status !== 'HELD') {
      throw new NotFoundError(`No held reservation for ref ${ref}`);
    }
    return reservation;
  }

  private async loadRecord(tx: StoreTransaction, variantId: string, branchId: string): Promise<StockRecord> {
    const record = await tx.get('stock', stockKey(variantId, branchId));
    return (
      record ?? {
        variantId,
        branchId,
        onHand: 0,
        reserved: 0,
        version: 0,
        updatedAt: tx.now,
      }
    );
  }

  private async apply(
    tx: StoreTransaction,
    ctx: OperationContext,
    record: StockRecord,
    next: Pick<StockRecord, 'onHand' | 'reserved'>,
    draft: MovementDraft,
  ): Promise<StockRecord> {
    if (next.reserved < 0 || next.reserved > next.onHand) {
      throw new InsufficientStockError(record.variantId, record.branchId, availableQuantity(record), Math.abs(draft.delta));
    }

    const updated: StockRecord = {
      ...record,
      onHand: next.onHand,
      reserved: next.reserved,
      version: record.version + 1,
      updatedAt: tx.now,
    };
    tx.put('stock', stockKey(record.variantId, record.branchId), updated);

    const movement = await tx.append('movement', record.branchId, (sequence) => ({
      id: uuidv4(),
      variantId: record.variantId,
      branchId: record.branchId,
      delta: draft.delta,
      kind: draft.kind,
      reference: draft.reference,
      reason: draft.reason,
      timestamp: tx.now,
      sequence,
    }));

    await this.alerts.evaluateIn(tx, updated);
    tx.onCommit(() => this.sync.schedule(record.branchId));

    ctx.logger.debug('stock_movement', {
      variantId: record.variantId,
      branchId: record.branchId,
      kind: movement.kind,
      delta: movement.delta,
      sequence: movement.sequence,
    });
    return updated;
  }
}
