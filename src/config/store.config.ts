import { registerAs } from '@nestjs/config';

export type StoreDriver = 'memory' | 'postgres';

function parseDriver(value: string | undefined): StoreDriver {
  return value === 'postgres' ? 'postgres' : 'memory';
}

export default registerAs('store', () => ({
  driver: parseDriver(process.env.STORE_DRIVER),
  databaseUrl: process.env.DATABASE_URL ?? '',
  poolMax: parseInt(process.env.DATABASE_POOL_MAX ?? '10', 10),
  conflictRetries: parseInt(process.env.STORE_CONFLICT_RETRIES ?? '5', 10),
  conflictBackoffMs: parseInt(process.env.STORE_CONFLICT_BACKOFF_MS ?? '10', 10),
}));
