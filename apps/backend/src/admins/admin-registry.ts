import { LedgerError, LedgerErrorCode } from '../common/ledger-error';
import type { AdminRegistry } from '../ledger/ledger.types';

export const MAX_ADMINS = 10;

export function initializeAdminRegistry(caller: string): AdminRegistry {
  return {
    authority: caller,
    admins: [caller],
    adminCount: 1,
  };
}

export function isAdmin(registry: AdminRegistry, address: string): boolean {
  return registry.admins.includes(address);
}

function assertAuthority(registry: AdminRegistry, caller: string) {
  if (registry.authority !== caller) {
    throw new LedgerError(LedgerErrorCode.UnauthorizedAdmin);
  }
}

export function addAdmin(registry: AdminRegistry, caller: string, newAdmin: string): AdminRegistry {
  assertAuthority(registry, caller);

  if (isAdmin(registry, newAdmin)) {
    throw new LedgerError(LedgerErrorCode.AdminAlreadyExists);
  }

  if (registry.adminCount >= MAX_ADMINS) {
    throw new LedgerError(LedgerErrorCode.MaxAdminsReached);
  }

  const admins = [...registry.admins, newAdmin];
  return {
    authority: registry.authority,
    admins,
    adminCount: admins.length,
  };
}

/** The last admin takes the removed admin's slot. */
export function removeAdmin(registry: AdminRegistry, caller: string, target: string): AdminRegistry {
  assertAuthority(registry, caller);

  if (registry.adminCount <= 1) {
    throw new LedgerError(LedgerErrorCode.CannotRemoveLastAdmin);
  }

  const index = registry.admins.indexOf(target);
  if (index === -1) {
    throw new LedgerError(LedgerErrorCode.AdminNotFound);
  }

  const admins = [...registry.admins];
  const last = admins.pop();
  if (last !== undefined && index < admins.length) {
    admins[index] = last;
  }

  return {
    authority: registry.authority,
    admins,
    adminCount: admins.length,
  };
}
