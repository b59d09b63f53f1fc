import { Global, Module } from '@nestjs/common';
import { CommandDispatcher } from './command-dispatcher.service';

@Global()
@Module({
  providers: [CommandDispatcher],
  exports: [CommandDispatcher],
})
export class CommandsModule {}
