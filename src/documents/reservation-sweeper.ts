import { Inject, Injectable, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { WINSTON_MODULE_PROVIDER } from 'nest-winston';
import { Logger } from 'winston';
import { CommandDispatcher } from '../commands/command-dispatcher.service';
import ledgerConfig from '../config/ledger.config';
import { DocumentsService, ExpirySweepResult } from './documents.service';

/** Time-triggered release of expired holds; disabled when the interval is 0. */
@Injectable()
export class ReservationSweeper implements OnModuleInit, OnModuleDestroy {
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<ExpirySweepResult> | null = null;

  constructor(
    private readonly documents: DocumentsService,
    private readonly dispatcher: CommandDispatcher,
    @Inject(ledgerConfig.KEY) private readonly settings: Pick<ConfigType<typeof ledgerConfig>, 'reservationSweepIntervalMs'>,
    @Inject(WINSTON_MODULE_PROVIDER) private readonly logger: Logger,
  ) {}

  onModuleInit() {
    const interval = this.settings.reservationSweepIntervalMs;
    if (interval <= 0) return;

    this.timer = setInterval(() => {
      if (this.running) return;
      this.running = this.sweep();
      void this.running
        .catch((err: unknown) => {
          this.logger.error('reservation_sweep_failed', { error: err instanceof Error ? err.message : String(err) });
        })
        .finally(() => {
          this.running = null;
        });
    }, interval);
    this.timer.unref();
  }

  sweep(now: Date = new Date()): Promise<ExpirySweepResult> {
    const ctx = this.dispatcher.systemContext('documents.expire');
    return this.documents.expireReservations(ctx, now);
  }

  async onModuleDestroy() {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.running) {
      await Promise.allSettled([this.running]);
    }
  }
}
