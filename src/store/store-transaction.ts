import {
  ChangeSet,
  CollectionMap,
  CollectionName,
  LogEntry,
  LogMap,
  LogName,
  LogRow,
  RecordWrite,
  StoreBackend,
  recordId,
} from './store.types';

type Observed = { version: number; body: string | null };

/**
 * Buffers writes and appends until commit. Each record put carries the
 * version observed when it was first read, so a commit only succeeds if no
 * other transaction wrote the record in between.
 */
export class StoreTransaction {
  private readonly observed = new Map<string, Observed>();
  private readonly writes = new Map<string, RecordWrite>();
  private readonly appends: LogRow[] = [];
  private readonly commitHooks: Array<() => void> = [];

  constructor(
    private readonly backend: StoreBackend,
    readonly startedAt: Date,
  ) {}

  get now(): string {
    return this.startedAt.toISOString();
  }

  async get<K extends CollectionName>(collection: K, key: string): Promise<CollectionMap[K] | null> {
    const id = recordId(collection, key);
    const pending = this.writes.get(id);
    if (pending) {
      return pending.body === null ? null : JSON.parse(pending.body);
    }
    let seen = this.observed.get(id);
    if (!seen) {
      const row = await this.backend.load(collection, key);
      seen = { version: row?.version ?? 0, body: row?.body ?? null };
      this.observed.set(id, seen);
    }
    return seen.body === null ? null : JSON.parse(seen.body);
  }

  /** Writes against the version read earlier in this transaction; unread keys are inserts. */
  put<K extends CollectionName>(collection: K, key: string, value: CollectionMap[K]): void {
    const id = recordId(collection, key);
    this.writes.set(id, {
      collection,
      key,
      expectedVersion: this.observed.get(id)?.version ?? 0,
      body: JSON.stringify(value),
    });
  }

  /** Deletes a record read earlier in this transaction, against the version observed. */
  remove(collection: CollectionName, key: string): void {
    const id = recordId(collection, key);
    this.writes.set(id, {
      collection,
      key,
      expectedVersion: this.observed.get(id)?.version ?? 0,
      body: null,
    });
  }

  async list<K extends CollectionName>(collection: K): Promise<CollectionMap[K][]> {
    const rows = await this.backend.list(collection);
    return rows.map((row) => JSON.parse(row.body));
  }

  /** Next value of a named gap-free counter; concurrent callers collide on the counter record. */
  async next(name: string): Promise<number> {
    const counter = await this.get('counter', name);
    const value = (counter?.value ?? 0) + 1;
    this.put('counter', name, { name, value });
    return value;
  }

  async append<L extends LogName>(
    log: L,
    partition: string,
    build: (sequence: number) => LogMap[L],
  ): Promise<LogMap[L]> {
    const sequence = await this.next(`${log}:${partition}`);
    const entry = build(sequence);
    this.appends.push({
      log,
      partition,
      sequence,
      body: JSON.stringify(entry),
      recordedAt: this.now,
    });
    return entry;
  }

  async readLog<L extends LogName>(
    log: L,
    partition: string,
    afterSequence = 0,
    limit = 500,
  ): Promise<LogEntry<LogMap[L]>[]> {
    const rows = await this.backend.readLog(log, partition, afterSequence, limit);
    return rows.map((row) => ({
      sequence: row.sequence,
      recordedAt: row.recordedAt,
      entry: JSON.parse(row.body),
    }));
  }

  onCommit(hook: () => void) {
    this.commitHooks.push(hook);
  }

  async commit() {
    const changes: ChangeSet = {
      writes: [...this.writes.values()],
      appends: this.appends,
    };
    if (changes.writes.length === 0 && changes.appends.length === 0) {
      return;
    }
    await this.backend.commit(changes);
  }

  runCommitHooks() {
    for (const hook of this.commitHooks) {
      hook();
    }
  }
}
