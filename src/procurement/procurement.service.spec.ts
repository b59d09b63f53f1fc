import { randomUUID } from 'crypto';
import { InvalidStateTransitionError, NotFoundError, ValidationError } from '../common/errors';
import { Variant } from '../catalog/catalog.types';
import {
  buildEngine,
  createTestSupplier,
  createTestVariant,
  Engine,
  testContext,
} from '../../test/helpers/test-factories';
import { PurchaseOrder } from './procurement.types';

const BRANCH = 'branch-main';
const ctx = testContext('INVENTORY', 'stock-clerk');

describe('ProcurementService', () => {
  let engine: Engine;
  let flour: Variant;
  let sugar: Variant;
  let supplierId: string;

  beforeEach(async () => {
    engine = buildEngine();
    flour = await createTestVariant(engine);
    sugar = await createTestVariant(engine);
    supplierId = (await createTestSupplier(engine)).id;
  });

  afterEach(() => engine.sync.idle());

  async function approvedOrder(quantity = 10): Promise<PurchaseOrder> {
    const order = await engine.procurement.create(ctx, supplierId, BRANCH, '2026-03-10', [
      { variantId: flour.id, quantity, unitCost: 400 },
    ]);
    return engine.procurement.approve(testContext('MANAGER'), order.id);
  }

  describe('create', () => {
    it('opens a numbered REQUESTED order', async () => {
      const order = await engine.procurement.create(ctx, supplierId, BRANCH, '2026-03-10', [
        { variantId: flour.id, quantity: 10, unitCost: 400 },
      ]);

      expect(order.status).toBe('REQUESTED');
      expect(order.number).toMatch(/^PO-\d{4}-0001$/);
      expect(order.lines).toEqual([
        { variantId: flour.id, orderedQuantity: 10, receivedQuantity: 0, unitCost: 400 },
      ]);
    });

    it('rejects an unknown supplier', async () => {
      await expect(
        engine.procurement.create(ctx, randomUUID(), BRANCH, '2026-03-10', [
          { variantId: flour.id, quantity: 1, unitCost: 400 },
        ]),
      ).rejects.toBeInstanceOf(NotFoundError);
    });

    it('rejects a duplicate variant line', async () => {
      await expect(
        engine.procurement.create(ctx, supplierId, BRANCH, '2026-03-10', [
          { variantId: flour.id, quantity: 1, unitCost: 400 },
          { variantId: flour.id, quantity: 2, unitCost: 400 },
        ]),
      ).rejects.toBeInstanceOf(ValidationError);
    });

    it('rejects an impossible expected date', async () => {
      await expect(
        engine.procurement.create(ctx, supplierId, BRANCH, '2026-02-30', [
          { variantId: flour.id, quantity: 1, unitCost: 400 },
        ]),
      ).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('receiveGRN', () => {
    it('rejects receiving more than was ordered and changes nothing', async () => {
      const order = await approvedOrder();

      await expect(
        engine.procurement.receiveGRN(ctx, order.id, [{ variantId: flour.id, quantity: 12 }]),
      ).rejects.toBeInstanceOf(ValidationError);

      const unchanged = await engine.procurement.get(order.id);
      expect(unchanged.status).toBe('APPROVED');
      expect(unchanged.lines[0].receivedQuantity).toBe(0);
      await expect(engine.ledger.getRecord(flour.id, BRANCH)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('rejects a variant the order does not carry', async () => {
      const order = await approvedOrder();
      await expect(
        engine.procurement.receiveGRN(ctx, order.id, [{ variantId: sugar.id, quantity: 1 }]),
      ).rejects.toBeInstanceOf(ValidationError);
    });

    it('requires an approved order', async () => {
      const order = await engine.procurement.create(ctx, supplierId, BRANCH, '2026-03-10', [
        { variantId: flour.id, quantity: 10, unitCost: 400 },
      ]);
      await expect(
        engine.procurement.receiveGRN(ctx, order.id, [{ variantId: flour.id, quantity: 1 }]),
      ).rejects.toBeInstanceOf(InvalidStateTransitionError);
    });

    it('replenishes stock and closes once everything has arrived', async () => {
      const order = await approvedOrder();

      const first = await engine.procurement.receiveGRN(
        ctx,
        order.id,
        [{ variantId: flour.id, quantity: 6 }],
        '2026-03-10',
      );
      expect(first.purchaseOrder.status).toBe('PARTIALLY_RECEIVED');
      expect(first.receipt).toMatchObject({ delayDays: 0, lines: [{ variantId: flour.id, quantity: 6 }] });
      expect(await engine.ledger.getRecord(flour.id, BRANCH)).toMatchObject({ onHand: 6, reserved: 0 });

      const second = await engine.procurement.receiveGRN(
        ctx,
        order.id,
        [
          { variantId: flour.id, quantity: 3 },
          { variantId: flour.id, quantity: 1 },
        ],
        '2026-03-12',
      );
      expect(second.purchaseOrder.status).toBe('CLOSED');
      expect(second.purchaseOrder.closedAt).not.toBeNull();
      expect(second.receipt).toMatchObject({ delayDays: 2, lines: [{ variantId: flour.id, quantity: 4 }] });
      expect(await engine.ledger.getRecord(flour.id, BRANCH)).toMatchObject({ onHand: 10 });

      const movements = await engine.ledger.listMovements(BRANCH);
      expect(movements.map((m) => [m.kind, m.delta, m.reference])).toEqual([
        ['replenish', 6, first.receipt.id],
        ['replenish', 4, second.receipt.id],
      ]);

      expect((await engine.procurement.listReceipts(order.id)).map((r) => r.id)).toEqual([
        first.receipt.id,
        second.receipt.id,
      ]);
      await expect(
        engine.procurement.receiveGRN(ctx, order.id, [{ variantId: flour.id, quantity: 1 }]),
      ).rejects.toBeInstanceOf(InvalidStateTransitionError);
    });
  });

  describe('vendor rating', () => {
    it('scores the supplier from its deliveries', async () => {
      const order = await approvedOrder();
      await engine.procurement.receiveGRN(ctx, order.id, [{ variantId: flour.id, quantity: 6 }], '2026-03-10');
      await engine.procurement.receiveGRN(ctx, order.id, [{ variantId: flour.id, quantity: 4 }], '2026-03-12');

      expect(await engine.procurement.getVendorRating(supplierId)).toMatchObject({
        deliveries: 2,
        onTimeDeliveries: 1,
        totalDelayDays: 2,
        orderedUnits: 10,
        deliveredUnits: 10,
        score: 3.75,
      });
    });

    it('is empty for a supplier with no history', async () => {
      expect(await engine.procurement.getVendorRating(supplierId)).toMatchObject({ deliveries: 0, score: 0 });
    });

    it('withdraws ordered units when an approved order is cancelled', async () => {
      const order = await approvedOrder(8);
      expect((await engine.procurement.getVendorRating(supplierId)).orderedUnits).toBe(8);

      await engine.procurement.cancel(ctx, order.id);
      expect((await engine.procurement.getVendorRating(supplierId)).orderedUnits).toBe(0);
    });
  });

  describe('close and cancel', () => {
    it('short-closes a partially received order', async () => {
      const order = await approvedOrder();
      await engine.procurement.receiveGRN(ctx, order.id, [{ variantId: flour.id, quantity: 3 }]);

      const closed = await engine.procurement.close(ctx, order.id);
      expect(closed.status).toBe('CLOSED');
    });

    it('cannot cancel after goods have arrived', async () => {
      const order = await approvedOrder();
      await engine.procurement.receiveGRN(ctx, order.id, [{ variantId: flour.id, quantity: 3 }]);

      await expect(engine.procurement.cancel(ctx, order.id)).rejects.toBeInstanceOf(InvalidStateTransitionError);
    });

    it('records status changes in the audit trail', async () => {
      const order = await approvedOrder();
      await engine.procurement.close(ctx, order.id);

      const trail = await engine.audit.history(order.id);
      expect(trail.map((e) => e.action)).toEqual(['created', 'status:APPROVED', 'status:CLOSED']);
      expect(trail[1].actorId).toBe('tester-1');
    });
  });
});
