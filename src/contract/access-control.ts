/**
 * Role-based access control and the authorized oracle set.
 *
 * Each account holds at most one role; granting replaces the previous one.
 * The oracle set is every account holding `Role.ORACLE`. It only changes
 * through an explicit admin transaction, and every change bumps
 * `oracleSetVersion` so readers can tell which configuration they checked.
 */

import { type Address, isAddressEqual } from 'viem'
import { Role, ROLE_LABELS, type ProtocolFee } from '../types/access'
import type { Transaction } from './host'
import { type ContractStorage, accountKey } from './storage'
import { fail } from './errors'

export const MAX_FEE_BPS = 1_000

export function superAdminOf(storage: ContractStorage): Address {
  return storage.getInstance().superAdmin ?? fail('NotInitialized', 'protocol has not been initialized')
}

export function roleOf(storage: ContractStorage, account: Address): Role | undefined {
  return storage.roles.get(accountKey(account))
}

export function hasRole(storage: ContractStorage, account: Address, role: Role): boolean {
  return roleOf(storage, account) === role
}

export function requireAnyRole(storage: ContractStorage, account: Address, roles: readonly Role[], action: string): Role {
  superAdminOf(storage)
  const role = roleOf(storage, account)
  if (role === undefined || !roles.includes(role)) {
    const held = role === undefined ? 'no role' : ROLE_LABELS[role]
    fail('Unauthorized', `${account} (${held}) may not ${action}`)
  }
  return role
}

export function authorizedOracles(storage: ContractStorage): Address[] {
  return storage.roles
    .entries()
    .filter(([, role]) => role === Role.ORACLE)
    .map(([account]) => account)
    .sort()
}

export function isAuthorizedOracle(storage: ContractStorage, account: Address): boolean {
  return hasRole(storage, account, Role.ORACLE)
}

function bumpOracleSet(tx: Transaction): void {
  const instance = tx.storage.getInstance()
  const version = instance.oracleSetVersion + 1
  tx.storage.setInstance({ ...instance, oracleSetVersion: version })
  tx.emit({ type: 'OracleSetUpdated', version, oracles: authorizedOracles(tx.storage) })
}

function assignRole(tx: Transaction, account: Address, role: Role, grantedBy: Address): void {
  const previous = roleOf(tx.storage, account)
  tx.storage.roles.set(accountKey(account), role)
  tx.emit({ type: 'RoleGranted', account: accountKey(account), role, grantedBy })
  if (previous === Role.ORACLE || role === Role.ORACLE) {
    if (previous !== role) bumpOracleSet(tx)
  }
}

// ---------------------------------------------------------------------------
// Admin transitions
// ---------------------------------------------------------------------------

export function init(tx: Transaction, superAdmin: Address): void {
  const instance = tx.storage.getInstance()
  if (instance.superAdmin !== null) {
    fail('AlreadyInitialized', `super admin is already ${instance.superAdmin}`)
  }
  tx.storage.setInstance({ ...instance, superAdmin: accountKey(superAdmin) })
  assignRole(tx, superAdmin, Role.SUPER_ADMIN, accountKey(superAdmin))
}

export function grantRole(tx: Transaction, caller: Address, account: Address, role: Role): void {
  const callerRole = requireAnyRole(tx.storage, caller, [Role.SUPER_ADMIN, Role.ADMIN], 'grant roles')

  if (role === Role.SUPER_ADMIN) {
    if (callerRole !== Role.SUPER_ADMIN) {
      fail('Unauthorized', 'only the super admin can hand over the super admin role')
    }
    fail('InvalidParameters', 'use transferSuperAdmin to change the super admin')
  }
  if (isAddressEqual(accountKey(account), superAdminOf(tx.storage))) {
    fail('InvalidParameters', 'the super admin role cannot be replaced by grantRole')
  }

  assignRole(tx, account, role, accountKey(caller))
}

/** Revoking an account that holds no role is a no-op */
export function revokeRole(tx: Transaction, caller: Address, account: Address): void {
  requireAnyRole(tx.storage, caller, [Role.SUPER_ADMIN, Role.ADMIN], 'revoke roles')

  const role = roleOf(tx.storage, account)
  if (role === undefined) return
  if (role === Role.SUPER_ADMIN) {
    fail('Unauthorized', 'the super admin role can only be transferred')
  }

  tx.storage.roles.delete(accountKey(account))
  tx.emit({ type: 'RoleRevoked', account: accountKey(account), role, revokedBy: accountKey(caller) })
  if (role === Role.ORACLE) bumpOracleSet(tx)
}

export function transferSuperAdmin(tx: Transaction, caller: Address, next: Address): void {
  const current = superAdminOf(tx.storage)
  if (!isAddressEqual(accountKey(caller), current)) {
    fail('Unauthorized', 'only the super admin can transfer the role')
  }
  if (isAddressEqual(accountKey(next), current)) {
    fail('InvalidParameters', `${next} is already the super admin`)
  }

  tx.storage.roles.delete(current)
  tx.storage.setInstance({ ...tx.storage.getInstance(), superAdmin: accountKey(next) })
  assignRole(tx, next, Role.SUPER_ADMIN, current)
  tx.emit({ type: 'SuperAdminTransferred', previous: current, next: accountKey(next) })
}

export function setProtocolFee(tx: Transaction, caller: Address, feeBps: number, recipient: Address): ProtocolFee {
  requireAnyRole(tx.storage, caller, [Role.SUPER_ADMIN, Role.ADMIN], 'configure the protocol fee')
  if (!Number.isInteger(feeBps) || feeBps < 0 || feeBps > MAX_FEE_BPS) {
    fail('InvalidParameters', `fee must be an integer between 0 and ${MAX_FEE_BPS} bps, got ${feeBps}`)
  }

  const fee: ProtocolFee = { feeBps, recipient: accountKey(recipient) }
  tx.storage.setInstance({ ...tx.storage.getInstance(), fee: feeBps === 0 ? null : fee })
  tx.emit({ type: 'ProtocolFeeUpdated', feeBps, recipient: fee.recipient })
  return fee
}
