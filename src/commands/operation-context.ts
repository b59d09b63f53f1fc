import type { Logger } from 'winston';
import type { Principal } from './roles';

/**
 * Passed explicitly into every workflow operation: who is acting, which
 * request this belongs to, and the logger scoped to that request.
 */
export interface OperationContext {
  principal: Principal;
  requestId: string;
  logger: Logger;
}
