import { Inject, Injectable } from '@nestjs/common';
import { WINSTON_MODULE_PROVIDER } from 'nest-winston';
import { Logger } from 'winston';
import { NotificationPublisher, StockAlertEvent } from './alerts.types';

/** Default sink when no delivery service is wired in. */
@Injectable()
export class LoggingNotificationPublisher implements NotificationPublisher {
  constructor(@Inject(WINSTON_MODULE_PROVIDER) private readonly logger: Logger) {}

  async publish(event: StockAlertEvent): Promise<void> {
    this.logger.warn(event.type, { ...event });
  }
}
