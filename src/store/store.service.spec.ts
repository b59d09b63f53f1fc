import { ConcurrencyConflictError } from '../common/errors';
import { MemoryStoreBackend } from './memory-store.backend';
import { StoreService } from './store.service';
import { createLogger, transports } from 'winston';

const logger = createLogger({ silent: true, transports: [new transports.Console()] });

describe('StoreService', () => {
  let backend: MemoryStoreBackend;
  let store: StoreService;

  beforeEach(() => {
    backend = new MemoryStoreBackend();
    store = new StoreService(backend, { conflictRetries: 2, conflictBackoffMs: 0 }, logger);
  });

  it('lets a transaction read its own writes', async () => {
    const value = await store.transaction(async (tx) => {
      tx.put('counter', 'c', { name: 'c', value: 7 });
      return (await tx.get('counter', 'c'))?.value;
    });
    expect(value).toBe(7);
  });

  it('hands out gap-free sequences per log partition', async () => {
    await store.transaction(async (tx) => {
      await tx.append('audit', 'e1', (sequence) => ({
        entityType: 'STOCK',
        entityId: 'e1',
        action: `a${sequence}`,
        actorId: 'u',
        role: 'ADMIN',
        requestId: 'r',
        detail: {},
        at: tx.now,
      }));
      await tx.append('audit', 'e1', (sequence) => ({
        entityType: 'STOCK',
        entityId: 'e1',
        action: `a${sequence}`,
        actorId: 'u',
        role: 'ADMIN',
        requestId: 'r',
        detail: {},
        at: tx.now,
      }));
    });

    const entries = await store.read((tx) => tx.readLog('audit', 'e1'));
    expect(entries.map((e) => [e.sequence, e.entry.action])).toEqual([
      [1, 'a1'],
      [2, 'a2'],
    ]);
  });

  it('re-runs the unit of work after a version conflict', async () => {
    await store.transaction(async (tx) => {
      await tx.next('shared');
    });

    let attempts = 0;
    const value = await store.transaction(async (tx) => {
      attempts++;
      const next = await tx.next('shared');
      if (attempts === 1) {
        // another writer slips in between our read and our commit
        await store.transaction((other) => other.next('shared'));
      }
      return next;
    });

    expect(attempts).toBe(2);
    expect(value).toBe(3);
  });

  it('surfaces the conflict once the retry budget is spent', async () => {
    let attempts = 0;
    await expect(
      store.transaction(async (tx) => {
        attempts++;
        await tx.next('hot');
        await store.transaction((other) => other.next('hot'));
      }),
    ).rejects.toBeInstanceOf(ConcurrencyConflictError);
    expect(attempts).toBe(3);
  });

  it('runs commit hooks only when the commit succeeds', async () => {
    const fired: string[] = [];
    await store.transaction(async (tx) => {
      await tx.next('ok');
      tx.onCommit(() => fired.push('ok'));
    });
    await expect(
      store.transaction(async (tx) => {
        tx.onCommit(() => fired.push('failed'));
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    expect(fired).toEqual(['ok']);
  });
});
