import { Module } from '@nestjs/common';
import { AlertsModule } from '../alerts/alerts.module';
import { SyncModule } from '../sync/sync.module';
import { StockController } from './stock.controller';
import { StockLedgerService } from './stock-ledger.service';

@Module({
  imports: [AlertsModule, SyncModule],
  controllers: [StockController],
  providers: [StockLedgerService],
  exports: [StockLedgerService],
})
export class StockModule {}
