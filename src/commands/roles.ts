export const ROLES = ['ADMIN', 'MANAGER', 'SALES', 'CASHIER', 'INVENTORY', 'SYSTEM'] as const;
export type Role = (typeof ROLES)[number];

export function isRole(value: string): value is Role {
  return ROLES.some((role) => role === value);
}

/** Authenticated caller, as handed over by the upstream auth layer. */
export interface Principal {
  id: string;
  role: Role;
  branchId?: string;
}

const STAFF: readonly Role[] = ['ADMIN', 'MANAGER', 'SALES', 'CASHIER', 'INVENTORY'];

/** Roles allowed to run each command. Checked by CommandDispatcher before any workflow code runs. */
export const COMMAND_ROLES = {
  'stock.read': [...STAFF, 'SYSTEM'],
  'stock.reserve': ['ADMIN', 'MANAGER', 'SALES'],
  'stock.release': ['ADMIN', 'MANAGER', 'SALES'],
  'stock.deduct': ['ADMIN', 'MANAGER'],
  'stock.replenish': ['ADMIN', 'MANAGER', 'INVENTORY'],
  'stock.adjust': ['ADMIN', 'MANAGER', 'INVENTORY'],
  'stock.transfer': ['ADMIN', 'MANAGER', 'INVENTORY'],
  'stock.setThreshold': ['ADMIN', 'MANAGER', 'INVENTORY'],
  'documents.read': STAFF,
  'documents.create': ['ADMIN', 'MANAGER', 'SALES'],
  'documents.approve': ['ADMIN', 'MANAGER', 'SALES'],
  'documents.convert': ['ADMIN', 'MANAGER', 'SALES'],
  'documents.invoice': ['ADMIN', 'MANAGER', 'SALES', 'CASHIER'],
  'documents.cancel': ['ADMIN', 'MANAGER', 'SALES'],
  'documents.expire': ['SYSTEM'],
  'payments.read': STAFF,
  'payments.apply': ['ADMIN', 'MANAGER', 'CASHIER'],
  'procurement.read': STAFF,
  'procurement.create': ['ADMIN', 'MANAGER', 'INVENTORY'],
  'procurement.approve': ['ADMIN', 'MANAGER'],
  'procurement.receive': ['ADMIN', 'MANAGER', 'INVENTORY'],
  'procurement.close': ['ADMIN', 'MANAGER'],
  'procurement.cancel': ['ADMIN', 'MANAGER'],
  'catalog.write': ['ADMIN', 'MANAGER', 'INVENTORY'],
  'sync.apply': ['ADMIN', 'SYSTEM'],
} satisfies Record<string, readonly Role[]>;

export type CommandName = keyof typeof COMMAND_ROLES;

export function isAllowed(command: CommandName, role: Role): boolean {
  const allowed: readonly Role[] = COMMAND_ROLES[command];
  return allowed.includes(role);
}
