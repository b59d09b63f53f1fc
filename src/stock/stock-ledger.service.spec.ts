import {
  ConcurrencyConflictError,
  InsufficientStockError,
  InvalidStateTransitionError,
  NotFoundError,
  ValidationError,
} from '../common/errors';
import { buildEngine, Engine, testContext } from '../../test/helpers/test-factories';

const V = 'variant-a';
const B1 = 'branch-1';
const B2 = 'branch-2';

describe('StockLedgerService', () => {
  let engine: Engine;
  const ctx = testContext('MANAGER');

  beforeEach(async () => {
    engine = buildEngine();
    await engine.ledger.replenish(ctx, V, B1, 10, 'opening');
  });

  afterEach(() => engine.sync.idle());

  describe('reserve', () => {
    it('increments reserved and appends a reserve movement', async () => {
      const record = await engine.ledger.reserve(ctx, V, B1, 3, 'r1');

      expect(record).toMatchObject({ onHand: 10, reserved: 3, version: 2 });
      const movements = await engine.ledger.listMovements(B1);
      expect(movements.map((m) => [m.sequence, m.kind, m.delta, m.reference])).toEqual([
        [1, 'replenish', 10, 'opening'],
        [2, 'reserve', 3, 'r1'],
      ]);
    });

    it('treats a replayed ref as a no-op', async () => {
      await engine.ledger.reserve(ctx, V, B1, 3, 'r1');
      const replay = await engine.ledger.reserve(ctx, V, B1, 3, 'r1');

      expect(replay).toMatchObject({ onHand: 10, reserved: 3, version: 2 });
      expect(await engine.ledger.listMovements(B1)).toHaveLength(2);
    });

    it('rejects a replayed ref that asks for a different hold', async () => {
      await engine.ledger.reserve(ctx, V, B1, 3, 'r1');

      await expect(engine.ledger.reserve(ctx, V, B1, 5, 'r1')).rejects.toBeInstanceOf(ValidationError);
      await expect(engine.ledger.reserve(ctx, V, B2, 3, 'r1')).rejects.toBeInstanceOf(ValidationError);
      await expect(engine.ledger.reserve(ctx, 'variant-b', B1, 3, 'r1')).rejects.toBeInstanceOf(ValidationError);
      await expect(engine.ledger.reserve(ctx, V, B1, 3, 'r1', { documentId: 'doc-1' })).rejects.toBeInstanceOf(
        ValidationError,
      );
      expect(await engine.ledger.getRecord(V, B1)).toMatchObject({ onHand: 10, reserved: 3, version: 2 });
      expect(await engine.ledger.getReservation('r1')).toMatchObject({ quantity: 3, documentId: null });
    });

    it('fails with InsufficientStockError and leaves nothing behind', async () => {
      await engine.ledger.reserve(ctx, V, B1, 8, 'r1');

      await expect(engine.ledger.reserve(ctx, V, B1, 3, 'r2')).rejects.toBeInstanceOf(InsufficientStockError);

      expect(await engine.ledger.getRecord(V, B1)).toMatchObject({ onHand: 10, reserved: 8 });
      await expect(engine.ledger.getReservation('r2')).rejects.toBeInstanceOf(NotFoundError);
      expect(await engine.ledger.listMovements(B1)).toHaveLength(2);
    });

    it('rejects a non-positive quantity as a ValidationError', async () => {
      await expect(engine.ledger.reserve(ctx, V, B1, 0, 'r1')).rejects.toBeInstanceOf(ValidationError);
      await expect(engine.ledger.reserve(ctx, V, B1, 1.5, 'r1')).rejects.toBeInstanceOf(ValidationError);
      expect(await engine.ledger.getRecord(V, B1)).toMatchObject({ reserved: 0 });
    });

    it('stamps an expiry when a TTL is given', async () => {
      await engine.ledger.reserve(ctx, V, B1, 2, 'r1', { ttlMinutes: 10 });
      await engine.ledger.reserve(ctx, V, B1, 2, 'r2');

      expect(await engine.ledger.listExpiredReservations(new Date())).toEqual([]);
      const later = new Date(Date.now() + 11 * 60_000);
      const expired = await engine.ledger.listExpiredReservations(later);
      expect(expired.map((r) => r.ref)).toEqual(['r1']);
    });

    it('drops settled holds from the expiry index', async () => {
      await engine.ledger.reserve(ctx, V, B1, 2, 'r1', { ttlMinutes: 10 });
      await engine.ledger.reserve(ctx, V, B1, 2, 'r2', { ttlMinutes: 10 });
      await engine.ledger.reserve(ctx, V, B1, 2, 'r3', { ttlMinutes: 10 });
      await engine.ledger.release(ctx, 'r1');
      await engine.ledger.deduct(ctx, 'r2');

      const indexed = await engine.backend.list('reservationExpiry');
      expect(indexed.map((row) => row.key)).toEqual(['r3']);
      const later = new Date(Date.now() + 11 * 60_000);
      expect((await engine.ledger.listExpiredReservations(later)).map((r) => r.ref)).toEqual(['r3']);
    });
  });

  describe('release', () => {
    it('returns reserved to its earlier value and marks the hold released', async () => {
      await engine.ledger.reserve(ctx, V, B1, 4, 'r1');
      const record = await engine.ledger.release(ctx, 'r1');

      expect(record).toMatchObject({ onHand: 10, reserved: 0 });
      expect((await engine.ledger.getReservation('r1')).status).toBe('RELEASED');
    });

    it('fails with NotFoundError for a hold that is no longer held', async () => {
      await engine.ledger.reserve(ctx, V, B1, 4, 'r1');
      await engine.ledger.release(ctx, 'r1');

      await expect(engine.ledger.release(ctx, 'r1')).rejects.toBeInstanceOf(NotFoundError);
      await expect(engine.ledger.release(ctx, 'unknown')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('refuses to release a hold owned by a document', async () => {
      await engine.ledger.reserve(ctx, V, B1, 4, 'doc-1:0', { documentId: 'doc-1' });

      await expect(engine.ledger.release(ctx, 'doc-1:0')).rejects.toBeInstanceOf(InvalidStateTransitionError);
      expect(await engine.ledger.getReservation('doc-1:0')).toMatchObject({ status: 'HELD' });
      expect(await engine.ledger.getRecord(V, B1)).toMatchObject({ onHand: 10, reserved: 4 });
    });
  });

  describe('deduct', () => {
    it('reduces on-hand by exactly the reserved quantity despite replenishments in between', async () => {
      await engine.ledger.reserve(ctx, V, B1, 4, 'r1');
      await engine.ledger.replenish(ctx, V, B1, 5, 'delivery-1');
      await engine.ledger.replenish(ctx, V, B2, 7, 'delivery-2');

      const record = await engine.ledger.deduct(ctx, 'r1');

      expect(record).toMatchObject({ onHand: 11, reserved: 0 });
      expect(await engine.ledger.getRecord(V, B2)).toMatchObject({ onHand: 7, reserved: 0 });
    });

    it('cannot deduct the same hold twice', async () => {
      await engine.ledger.reserve(ctx, V, B1, 4, 'r1');
      await engine.ledger.deduct(ctx, 'r1');

      await expect(engine.ledger.deduct(ctx, 'r1')).rejects.toBeInstanceOf(NotFoundError);
      expect(await engine.ledger.getRecord(V, B1)).toMatchObject({ onHand: 6, reserved: 0 });
    });

    it('refuses to deduct a hold owned by a document', async () => {
      await engine.ledger.reserve(ctx, V, B1, 4, 'doc-1:0', { documentId: 'doc-1' });

      await expect(engine.ledger.deduct(ctx, 'doc-1:0')).rejects.toBeInstanceOf(InvalidStateTransitionError);
      expect(await engine.ledger.getRecord(V, B1)).toMatchObject({ onHand: 10, reserved: 4 });
    });
  });

  describe('adjust', () => {
    it('applies a signed correction to on-hand', async () => {
      const record = await engine.ledger.adjust(ctx, V, B1, -2, 'damaged');

      expect(record).toMatchObject({ onHand: 8, reserved: 0 });
      const [, last] = await engine.ledger.listMovements(B1);
      expect(last).toMatchObject({ kind: 'adjustment', delta: -2, reason: 'damaged' });
    });

    it('refuses to take on-hand below reserved', async () => {
      await engine.ledger.reserve(ctx, V, B1, 6, 'r1');

      await expect(engine.ledger.adjust(ctx, V, B1, -5, 'count')).rejects.toBeInstanceOf(InsufficientStockError);
      expect(await engine.ledger.getRecord(V, B1)).toMatchObject({ onHand: 10, reserved: 6 });
    });

    it('rejects a zero delta or a blank reason', async () => {
      await expect(engine.ledger.adjust(ctx, V, B1, 0, 'noop')).rejects.toBeInstanceOf(ValidationError);
      await expect(engine.ledger.adjust(ctx, V, B1, 1, '  ')).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('transfer', () => {
    it('moves stock between branches in one transaction', async () => {
      const [source, destination] = await engine.ledger.transfer(ctx, V, B1, B2, 4, 't1');

      expect(source).toMatchObject({ branchId: B1, onHand: 6 });
      expect(destination).toMatchObject({ branchId: B2, onHand: 4 });
      const [outgoing] = (await engine.ledger.listMovements(B1)).slice(-1);
      expect(outgoing).toMatchObject({ kind: 'adjustment', delta: -4, reason: 'transfer:t1' });
      const [incoming] = await engine.ledger.listMovements(B2);
      expect(incoming).toMatchObject({ kind: 'replenish', delta: 4, reference: 't1', sequence: 1 });
    });

    it('leaves the destination untouched when the source is short', async () => {
      await expect(engine.ledger.transfer(ctx, V, B1, B2, 11, 't1')).rejects.toBeInstanceOf(
        InsufficientStockError,
      );
      await expect(engine.ledger.getRecord(V, B2)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('rejects a transfer within one branch', async () => {
      await expect(engine.ledger.transfer(ctx, V, B1, B1, 1, 't1')).rejects.toBeInstanceOf(ValidationError);
    });

    it('reports bad arguments through the returned promise', async () => {
      let pending: Promise<unknown> | undefined;
      expect(() => {
        pending = engine.ledger.transfer(ctx, V, B1, B2, 0, 't1');
      }).not.toThrow();
      await expect(pending).rejects.toBeInstanceOf(ValidationError);
    });
  });

  it('never oversells under concurrent reservations', async () => {
    const results = await Promise.allSettled(
      Array.from({ length: 10 }, (_, i) => engine.ledger.reserve(ctx, V, B1, 3, `c${i}`)),
    );

    const succeeded = results.filter((r) => r.status === 'fulfilled');
    const failures = results.flatMap((r) => (r.status === 'rejected' ? [r.reason] : []));
    expect(succeeded.length).toBeGreaterThan(0);
    expect(succeeded.length).toBeLessThanOrEqual(3);
    for (const reason of failures) {
      expect(reason instanceof InsufficientStockError || reason instanceof ConcurrencyConflictError).toBe(true);
    }

    const record = await engine.ledger.getRecord(V, B1);
    expect(record.reserved).toBe(3 * succeeded.length);
    expect(record.reserved).toBeLessThanOrEqual(record.onHand);
  });
});
