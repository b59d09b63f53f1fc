import { ForbiddenException, Inject, Injectable } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { WINSTON_MODULE_PROVIDER } from 'nest-winston';
import { Logger } from 'winston';
import { getContext } from '../common/request-context';
import { OperationContext } from './operation-context';
import { CommandName, Principal, isAllowed } from './roles';

export const SYSTEM_PRINCIPAL: Principal = { id: 'system', role: 'SYSTEM' };

@Injectable()
export class CommandDispatcher {
  constructor(@Inject(WINSTON_MODULE_PROVIDER) private readonly logger: Logger) {}

  async execute<T>(
    command: CommandName,
    principal: Principal,
    run: (ctx: OperationContext) => Promise<T>,
  ): Promise<T> {
    const ctx = this.createContext(command, principal);

    if (!isAllowed(command, principal.role)) {
      ctx.logger.warn('command_denied');
      throw new ForbiddenException({
        message: `Role ${principal.role} is not allowed to run ${command}`,
        errorCode: 'FORBIDDEN',
      });
    }

    const start = Date.now();
    try {
      const result = await run(ctx);
      ctx.logger.info('command_completed', { duration: Date.now() - start });
      return result;
    } catch (err) {
      ctx.logger.warn('command_failed', {
        duration: Date.now() - start,
        error: err instanceof Error ? err.message : String(err),
      });
      throw err;
    }
  }

  /** Context for work no request started: sweeps, inbound replication. */
  systemContext(command: CommandName): OperationContext {
    return this.createContext(command, SYSTEM_PRINCIPAL);
  }

  private createContext(command: CommandName, principal: Principal): OperationContext {
    const requestId = getContext()?.requestId ?? randomUUID();
    return {
      principal,
      requestId,
      logger: this.logger.child({ requestId, principalId: principal.id, role: principal.role, command }),
    };
  }
}
