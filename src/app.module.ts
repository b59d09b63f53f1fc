import { Module, NestModule, MiddlewareConsumer } from '@nestjs/common';
import { APP_FILTER, APP_GUARD, APP_INTERCEPTOR } from '@nestjs/core';
import { WinstonModule } from 'nest-winston';
import { ConfigService } from '@nestjs/config';
import { AuditModule } from './audit/audit.module';
import { CatalogModule } from './catalog/catalog.module';
import { CommandsModule } from './commands/commands.module';
import { DocumentsModule } from './documents/documents.module';
import { HealthModule } from './health/health.module';
import { PaymentsModule } from './payments/payments.module';
import { ProcurementModule } from './procurement/procurement.module';
import { StockModule } from './stock/stock.module';
import { StoreModule } from './store/store.module';
import { SyncModule } from './sync/sync.module';
import { PrincipalGuard } from './common/guards/principal.guard';
import { RequestContextMiddleware } from './common/middleware/request-context.middleware';
import { PrincipalContextMiddleware } from './common/middleware/principal-context.middleware';
import { AppConfigModule } from './config/config.module';
import { createLoggerOptions } from './common/logger.config';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';
import { LoggingInterceptor } from './common/interceptors/logging.interceptor';

@Module({
  imports: [
    AppConfigModule,
    WinstonModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) =>
        createLoggerOptions(
          config.get<string>('app.logFormat') ?? 'json',
          config.get<string>('app.logLevel') ?? 'info',
          config.get<string>('app.nodeEnv') === 'test',
        ),
    }),
    StoreModule,
    CommandsModule,
    AuditModule,
    CatalogModule,
    SyncModule,
    StockModule,
    DocumentsModule,
    PaymentsModule,
    ProcurementModule,
    HealthModule,
  ],
  providers: [
    RequestContextMiddleware,
    PrincipalContextMiddleware,
    {
      provide: APP_GUARD,
      useClass: PrincipalGuard,
    },
    {
      provide: APP_FILTER,
      useClass: HttpExceptionFilter,
    },
    {
      provide: APP_INTERCEPTOR,
      useClass: LoggingInterceptor,
    },
  ],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer) {
    consumer.apply(RequestContextMiddleware, PrincipalContextMiddleware).forRoutes('*');
  }
}
