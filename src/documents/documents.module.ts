import { Module } from '@nestjs/common';
import { AuditModule } from '../audit/audit.module';
import { CatalogModule } from '../catalog/catalog.module';
import { StockModule } from '../stock/stock.module';
import { DocumentsController } from './documents.controller';
import { DocumentsService } from './documents.service';
import { ReservationSweeper } from './reservation-sweeper';

@Module({
  imports: [StockModule, CatalogModule, AuditModule],
  controllers: [DocumentsController],
  providers: [DocumentsService, ReservationSweeper],
  exports: [DocumentsService],
})
export class DocumentsModule {}
