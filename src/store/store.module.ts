import { Global, Module } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import storeConfig from '../config/store.config';
import { KyselyStoreBackend, createStoreDatabase } from './kysely-store.backend';
import { MemoryStoreBackend } from './memory-store.backend';
import { StoreService } from './store.service';
import { STORE_BACKEND, StoreBackend } from './store.types';

@Global()
@Module({
  providers: [
    {
      provide: STORE_BACKEND,
      inject: [storeConfig.KEY],
      useFactory: (config: ConfigType<typeof storeConfig>): StoreBackend =>
        config.driver === 'postgres'
          ? new KyselyStoreBackend(createStoreDatabase(config.databaseUrl, config.poolMax))
          : new MemoryStoreBackend(),
    },
    StoreService,
  ],
  exports: [StoreService],
})
export class StoreModule {}
