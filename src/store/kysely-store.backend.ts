import { Kysely, PostgresDialect } from 'kysely';
import { Pool } from 'pg';
import { ConcurrencyConflictError } from '../common/errors';
import {
  ChangeSet,
  CollectionName,
  LogName,
  LogRow,
  RecordRow,
  StoreBackend,
} from './store.types';

interface StoreRecordsTable {
  collection: string;
  key: string;
  version: number;
  body: string;
}

interface StoreLogEntriesTable {
  log: string;
  partition: string;
  sequence: number;
  body: string;
  recorded_at: string;
}

export interface StoreDatabase {
  store_records: StoreRecordsTable;
  store_log_entries: StoreLogEntriesTable;
}

export function createStoreDatabase(connectionString: string, poolMax: number) {
  const dialect = new PostgresDialect({
    pool: new Pool({
      connectionString,
      max: poolMax,
      idleTimeoutMillis: 10000,
    }),
  });
  return new Kysely<StoreDatabase>({ dialect });
}

/**
 * Postgres backend (schema in sql/001_store.sql). Version checks are
 * conditional UPDATEs / conflict-free INSERTs inside one database
 * transaction, so a lost race rolls the whole change set back.
 */
export class KyselyStoreBackend implements StoreBackend {
  constructor(private readonly db: Kysely<StoreDatabase>) {}

  async load(collection: CollectionName, key: string): Promise<RecordRow | null> {
    const row = await this.db
      .selectFrom('store_records')
      .select(['version', 'body'])
      .where('collection', '=', collection)
      .where('key', '=', key)
      .executeTakeFirst();
    return row ? { collection, key, version: row.version, body: row.body } : null;
  }

  async list(collection: CollectionName): Promise<RecordRow[]> {
    const rows = await this.db
      .selectFrom('store_records')
      .select(['key', 'version', 'body'])
      .where('collection', '=', collection)
      .orderBy('key')
      .execute();
    return rows.map((row) => ({ collection, key: row.key, version: row.version, body: row.body }));
  }

  async readLog(log: LogName, partition: string, afterSequence: number, limit: number): Promise<LogRow[]> {
    const rows = await this.db
      .selectFrom('store_log_entries')
      .select(['sequence', 'body', 'recorded_at'])
      .where('log', '=', log)
      .where('partition', '=', partition)
      .where('sequence', '>', afterSequence)
      .orderBy('sequence')
      .limit(limit)
      .execute();
    return rows.map((row) => ({
      log,
      partition,
      sequence: row.sequence,
      body: row.body,
      recordedAt: row.recorded_at,
    }));
  }

  async commit(changes: ChangeSet): Promise<void> {
    await this.db.transaction().execute(async (trx) => {
      for (const write of changes.writes) {
        if (write.body === null) {
          if (write.expectedVersion === 0) {
            continue;
          }
          const deleted = await trx
            .deleteFrom('store_records')
            .where('collection', '=', write.collection)
            .where('key', '=', write.key)
            .where('version', '=', write.expectedVersion)
            .executeTakeFirst();
          if (deleted.numDeletedRows === 0n) {
            throw new ConcurrencyConflictError(
              `${write.collection} ${write.key} changed (expected version ${write.expectedVersion})`,
            );
          }
          continue;
        }
        if (write.expectedVersion === 0) {
          const inserted = await trx
            .insertInto('store_records')
            .values({ collection: write.collection, key: write.key, version: 1, body: write.body })
            .onConflict((oc) => oc.columns(['collection', 'key']).doNothing())
            .executeTakeFirst();
          if (!inserted.numInsertedOrUpdatedRows) {
            throw new ConcurrencyConflictError(`${write.collection} ${write.key} was created concurrently`);
          }
          continue;
        }
        const updated = await trx
          .updateTable('store_records')
          .set({ version: write.expectedVersion + 1, body: write.body })
          .where('collection', '=', write.collection)
          .where('key', '=', write.key)
          .where('version', '=', write.expectedVersion)
          .executeTakeFirst();
        if (updated.numUpdatedRows === 0n) {
          throw new ConcurrencyConflictError(
            `${write.collection} ${write.key} changed (expected version ${write.expectedVersion})`,
          );
        }
      }
      if (changes.appends.length > 0) {
        await trx
          .insertInto('store_log_entries')
          .values(
            changes.appends.map((append) => ({
              log: append.log,
              partition: append.partition,
              sequence: append.sequence,
              body: append.body,
              recorded_at: append.recordedAt,
            })),
          )
          .execute();
      }
    });
  }

  async ping(): Promise<void> {
    await this.db.selectFrom('store_records').select('version').limit(1).execute();
  }

  async close(): Promise<void> {
    await this.db.destroy();
  }
}
