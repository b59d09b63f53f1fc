import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import appConfig from './app.config';
import ledgerConfig from './ledger.config';
import storeConfig from './store.config';
import { validate } from './env.validation';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [appConfig, storeConfig, ledgerConfig],
      validate,
    }),
  ],
})
export class AppConfigModule {}
