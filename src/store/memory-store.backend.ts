import { ConcurrencyConflictError } from '../common/errors';
import {
  ChangeSet,
  CollectionName,
  LogName,
  LogRow,
  RecordRow,
  StoreBackend,
  logId,
  recordId,
} from './store.types';

/**
 * In-process backend. Rows are kept serialized so callers never share object
 * references with the store. Commit validates every version before touching
 * anything and then applies synchronously, which makes it atomic.
 */
export class MemoryStoreBackend implements StoreBackend {
  private readonly records = new Map<string, RecordRow>();
  private readonly logs = new Map<string, LogRow[]>();

  async load(collection: CollectionName, key: string): Promise<RecordRow | null> {
    const row = this.records.get(recordId(collection, key));
    return row ? { ...row } : null;
  }

  async list(collection: CollectionName): Promise<RecordRow[]> {
    return [...this.records.values()]
      .filter((row) => row.collection === collection)
      .map((row) => ({ ...row }));
  }

  async readLog(log: LogName, partition: string, afterSequence: number, limit: number): Promise<LogRow[]> {
    const rows = this.logs.get(logId(log, partition)) ?? [];
    return rows.filter((row) => row.sequence > afterSequence).slice(0, limit).map((row) => ({ ...row }));
  }

  async commit(changes: ChangeSet): Promise<void> {
    for (const write of changes.writes) {
      const current = this.records.get(recordId(write.collection, write.key))?.version ?? 0;
      if (current !== write.expectedVersion) {
        throw new ConcurrencyConflictError(
          `${write.collection} ${write.key} changed (expected version ${write.expectedVersion}, found ${current})`,
        );
      }
    }
    for (const append of changes.appends) {
      const rows = this.logs.get(logId(append.log, append.partition)) ?? [];
      if (rows.some((row) => row.sequence === append.sequence)) {
        throw new ConcurrencyConflictError(`${append.log} ${append.partition} sequence ${append.sequence} already taken`);
      }
    }

    for (const write of changes.writes) {
      if (write.body === null) {
        this.records.delete(recordId(write.collection, write.key));
        continue;
      }
      this.records.set(recordId(write.collection, write.key), {
        collection: write.collection,
        key: write.key,
        version: write.expectedVersion + 1,
        body: write.body,
      });
    }
    for (const append of changes.appends) {
      const id = logId(append.log, append.partition);
      const rows = this.logs.get(id) ?? [];
      rows.push({ ...append });
      rows.sort((a, b) => a.sequence - b.sequence);
      this.logs.set(id, rows);
    }
  }

  async ping(): Promise<void> {}

  async close(): Promise<void> {}
}
