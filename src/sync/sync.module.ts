import { Module } from '@nestjs/common';
import { BranchSyncService } from './branch-sync.service';
import { InMemorySyncChannel } from './in-memory-sync.channel';
import { SyncController } from './sync.controller';
import { SYNC_CHANNEL } from './sync.types';

@Module({
  controllers: [SyncController],
  providers: [BranchSyncService, { provide: SYNC_CHANNEL, useClass: InMemorySyncChannel }],
  exports: [BranchSyncService],
})
export class SyncModule {}
