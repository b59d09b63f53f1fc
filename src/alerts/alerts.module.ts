import { Module } from '@nestjs/common';
import { NOTIFICATION_PUBLISHER } from './alerts.types';
import { AlertsService } from './alerts.service';
import { LoggingNotificationPublisher } from './logging-notification.publisher';

@Module({
  providers: [AlertsService, { provide: NOTIFICATION_PUBLISHER, useClass: LoggingNotificationPublisher }],
  exports: [AlertsService],
})
export class AlertsModule {}
