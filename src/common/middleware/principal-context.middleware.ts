import { Injectable, NestMiddleware } from '@nestjs/common';
import { Request, Response, NextFunction } from 'express';
import { isRole } from '../../commands/roles';
import { setContext } from '../request-context';

export const PRINCIPAL_ID_HEADER = 'x-principal-id';
export const PRINCIPAL_ROLE_HEADER = 'x-principal-role';
export const PRINCIPAL_BRANCH_HEADER = 'x-branch-id';

function header(req: Request, name: string): string | undefined {
  const value = req.headers[name];
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Identity is established upstream; the gateway forwards the authenticated
 * principal in headers. Requests without a recognised role carry no principal
 * and are turned away by PrincipalGuard.
 */
@Injectable()
export class PrincipalContextMiddleware implements NestMiddleware {
  use(req: Request, _res: Response, next: NextFunction) {
    const principalId = header(req, PRINCIPAL_ID_HEADER)?.trim();
    const role = header(req, PRINCIPAL_ROLE_HEADER)?.trim().toUpperCase();
    if (principalId && role && isRole(role)) {
      setContext({
        principalId,
        role,
        branchId: header(req, PRINCIPAL_BRANCH_HEADER)?.trim() || undefined,
      });
    }
    return next();
  }
}
