import { NotFoundError, ValidationError } from '../common/errors';
import { StockMovement } from '../stock/stock.types';
import {
  buildEngine,
  createTestVariant,
  Engine,
  stockUp,
  testContext,
} from '../../test/helpers/test-factories';
import { InMemorySyncChannel } from './in-memory-sync.channel';

const ORIGIN = 'branch-A';
const ctx = testContext('SALES');

describe('BranchSyncService', () => {
  let channel: InMemorySyncChannel;
  let origin: Engine;
  let replica: Engine;
  let variantId: string;

  beforeEach(async () => {
    channel = new InMemorySyncChannel();
    origin = buildEngine({ channel });
    replica = buildEngine({ channel });
    replica.sync.connect('branch-B');
    variantId = (await createTestVariant(origin)).id;
  });

  afterEach(async () => {
    await origin.sync.idle();
    await replica.sync.idle();
  });

  it('replicates committed movements to other branches', async () => {
    await stockUp(origin, variantId, ORIGIN, 10);
    await origin.ledger.reserve(ctx, variantId, ORIGIN, 3, 'order-1');
    await origin.ledger.deduct(ctx, 'order-1');
    await origin.sync.idle();

    expect(await replica.sync.getReplica(variantId, ORIGIN)).toMatchObject({ onHand: 7, reserved: 0 });
    expect(await origin.ledger.getRecord(variantId, ORIGIN)).toMatchObject({ onHand: 7, reserved: 0 });
  });

  it("keeps replicas apart from the node's own stock", async () => {
    await replica.ledger.replenish(ctx, variantId, ORIGIN, 50, 'local-count');
    await stockUp(origin, variantId, ORIGIN, 10);
    await origin.sync.idle();

    expect(await replica.ledger.getRecord(variantId, ORIGIN)).toMatchObject({ onHand: 50, reserved: 0 });
    expect(await replica.sync.getReplica(variantId, ORIGIN)).toMatchObject({ onHand: 10, reserved: 0 });
    await expect(origin.sync.getReplica(variantId, ORIGIN)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('delivers movements in sequence order', async () => {
    const sequences: number[] = [];
    channel.subscribe('branch-C', async (_origin, movement) => {
      sequences.push(movement.sequence);
    });

    await stockUp(origin, variantId, ORIGIN, 10);
    await origin.ledger.adjust(ctx, variantId, ORIGIN, -2, 'damaged');
    await origin.ledger.reserve(ctx, variantId, ORIGIN, 1, 'order-2');
    await origin.sync.idle();

    expect(sequences).toEqual([1, 2, 3]);
  });

  it('ignores a redelivered movement', async () => {
    await stockUp(origin, variantId, ORIGIN, 10);
    await origin.sync.idle();
    const [movement] = await origin.ledger.listMovements(ORIGIN);

    expect(await replica.sync.applyRemote(movement, ORIGIN)).toBe(false);
    expect(await replica.sync.getReplica(variantId, ORIGIN)).toMatchObject({ onHand: 10 });
  });

  it('refuses a movement that skips a sequence number', async () => {
    const fresh = buildEngine();
    const movement: StockMovement = {
      id: 'f7a1c2d3-0000-4000-8000-000000000001',
      variantId,
      branchId: ORIGIN,
      delta: 5,
      kind: 'replenish',
      reference: 'delivery-1',
      reason: null,
      timestamp: '2026-03-02T09:30:00.000Z',
      sequence: 2,
    };

    await expect(fresh.sync.applyRemote(movement, ORIGIN)).rejects.toBeInstanceOf(ValidationError);
    await expect(fresh.sync.getReplica(variantId, ORIGIN)).rejects.toBeInstanceOf(NotFoundError);

    expect(await fresh.sync.applyRemote({ ...movement, sequence: 1 }, ORIGIN)).toBe(true);
    expect(await fresh.sync.applyRemote(movement, ORIGIN)).toBe(true);
    expect(await fresh.sync.getReplica(variantId, ORIGIN)).toMatchObject({ onHand: 10, reserved: 0, version: 2 });
  });

  it('refuses a fold that would reserve more than is on hand', async () => {
    const fresh = buildEngine();
    const movement: StockMovement = {
      id: 'f7a1c2d3-0000-4000-8000-000000000002',
      variantId,
      branchId: ORIGIN,
      delta: 2,
      kind: 'reserve',
      reference: 'order-9',
      reason: null,
      timestamp: '2026-03-02T09:30:00.000Z',
      sequence: 1,
    };

    await expect(fresh.sync.applyRemote(movement, ORIGIN)).rejects.toBeInstanceOf(ValidationError);
    await expect(fresh.sync.getReplica(variantId, ORIGIN)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('catches a replica up on everything it missed while disconnected', async () => {
    await stockUp(origin, variantId, ORIGIN, 10);
    await origin.sync.idle();

    channel.unsubscribe('branch-B');
    await origin.ledger.adjust(ctx, variantId, ORIGIN, -3, 'damaged');
    await origin.sync.idle();
    expect(await replica.sync.getReplica(variantId, ORIGIN)).toMatchObject({ onHand: 10 });

    replica.sync.connect('branch-B');
    await origin.ledger.adjust(ctx, variantId, ORIGIN, 5, 'recount');
    await origin.sync.idle();

    expect(await replica.sync.getReplica(variantId, ORIGIN)).toMatchObject({ onHand: 12, reserved: 0, version: 3 });
  });

  it('rejects a movement that claims the wrong origin', async () => {
    await stockUp(origin, variantId, ORIGIN, 1);
    await origin.sync.idle();
    const [movement] = await origin.ledger.listMovements(ORIGIN);

    await expect(replica.sync.applyRemote(movement, 'branch-Z')).rejects.toBeInstanceOf(ValidationError);
  });

  it('retries a failed publish on the next flush', async () => {
    let linkUp = false;
    const received: StockMovement[] = [];
    channel.subscribe('branch-D', async (_origin, movement) => {
      if (!linkUp) throw new Error('link down');
      received.push(movement);
    });

    await stockUp(origin, variantId, ORIGIN, 4);
    await origin.sync.idle();
    expect(received).toEqual([]);

    linkUp = true;
    expect(await origin.sync.flush(ORIGIN)).toBe(1);
    expect(received.map((m) => [m.kind, m.delta])).toEqual([['replenish', 4]]);
    expect(await origin.sync.flush(ORIGIN)).toBe(0);
  });
});
