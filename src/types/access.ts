/**
 * Impact Escrow Protocol — Access Control Types
 */

import type { Address } from 'viem'

export enum Role {
  SUPER_ADMIN = 0,
  ADMIN = 1,
  ORACLE = 2,
  PROJECT_MANAGER = 3,
  AUDITOR = 4,
}

export const ROLE_LABELS: Record<Role, string> = {
  [Role.SUPER_ADMIN]: 'SuperAdmin',
  [Role.ADMIN]: 'Admin',
  [Role.ORACLE]: 'Oracle',
  [Role.PROJECT_MANAGER]: 'ProjectManager',
  [Role.AUDITOR]: 'Auditor',
}

/** Roles allowed to register projects */
export const REGISTRAR_ROLES: readonly Role[] = [Role.SUPER_ADMIN, Role.ADMIN, Role.PROJECT_MANAGER]

export interface ProtocolFee {
  feeBps: number                    // Basis points of the released amount (0-1000)
  recipient: Address
}
