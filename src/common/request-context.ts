import { AsyncLocalStorage } from 'async_hooks';
import type { Role } from '../commands/roles';

export type RequestContext = {
  requestId: string;
  principalId?: string;
  role?: Role;
  branchId?: string;
};

const asyncLocalStorage = new AsyncLocalStorage<RequestContext>();

export function runWithContext(context: RequestContext, callback: () => void) {
  asyncLocalStorage.run(context, callback);
}

export function getContext(): RequestContext | undefined {
  return asyncLocalStorage.getStore();
}

export function setContext(values: Partial<RequestContext>) {
  const store = asyncLocalStorage.getStore();
  if (!store) {
    return;
  }
  Object.assign(store, values);
}
