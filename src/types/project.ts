/**
 * Impact Escrow Protocol — Project & Donation Types
 * Shared type definitions for the Project Registry and Funding Ledger
 */

import type { Address, Hex } from 'viem'

export enum ProjectStatus {
  FUNDING = 0,
  ACTIVE = 1,
  PROOF_SUBMITTED = 2,
  COMPLETED = 3,
  EXPIRED = 4,
}

export enum DonationSettlement {
  LOCKED = 0,
  RELEASED = 1,
  REFUNDED = 2,
}

export interface Project {
  id: number                        // Assigned at registration, starts at 1
  creator: Address                  // Account that registered the project
  implementer: Address              // Payout identity for released funds
  target: bigint                    // Funding target in the asset's smallest unit
  funded: bigint                    // Sum of recorded donations
  deadline: number                  // Unix timestamp (seconds)
  proofSchemaHash: Hex              // bytes32 hash of the expected proof schema
  status: ProjectStatus
  activeSubmissionId: number | null // Latest proof submission, if any
  donationCount: number
  settled: boolean                  // Release idempotency flag, separate from status
  createdAt: number
}

export interface RegisterProjectParams {
  target: bigint
  deadline: number
  proofSchemaHash: Hex
  implementer?: Address             // Defaults to the creator
}

export interface Donation {
  projectId: number
  id: number                        // Per-project sequence, starts at 1
  commitment: Hex                   // Binds nonce + donor identity + amount
  amount: bigint
  timestamp: number
  settlement: DonationSettlement
}

export const PROJECT_STATUS_LABELS: Record<ProjectStatus, string> = {
  [ProjectStatus.FUNDING]: 'Funding',
  [ProjectStatus.ACTIVE]: 'Active',
  [ProjectStatus.PROOF_SUBMITTED]: 'ProofSubmitted',
  [ProjectStatus.COMPLETED]: 'Completed',
  [ProjectStatus.EXPIRED]: 'Expired',
}

export function isTerminalStatus(status: ProjectStatus): boolean {
  return status === ProjectStatus.COMPLETED || status === ProjectStatus.EXPIRED
}
