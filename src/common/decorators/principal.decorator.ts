import { createParamDecorator, UnauthorizedException } from '@nestjs/common';
import type { Principal } from '../../commands/roles';
import { getContext } from '../request-context';

export function principalFromContext(): Principal {
  const store = getContext();
  if (!store?.principalId || !store.role) {
    throw new UnauthorizedException('Principal context missing');
  }
  return { id: store.principalId, role: store.role, branchId: store.branchId };
}

export const CurrentPrincipal = createParamDecorator(() => principalFromContext());
