/**
 * Impact Escrow Protocol — Event Types
 * Events emitted by the contract for off-chain indexing and the oracle loop
 */

import type { Address, Hex } from 'viem'
import type { Role } from './access'
import type { Verdict } from './proof'

export type ProtocolEventBody =
  | { type: 'ProjectRegistered'; projectId: number; creator: Address; implementer: Address; target: bigint; deadline: number }
  | { type: 'DonationReceived'; projectId: number; donationId: number; amount: bigint }
  | { type: 'ProofSubmitted'; projectId: number; submissionId: number; commitment: Hex }
  | { type: 'ProofVerified'; projectId: number; submissionId: number; verdict: Verdict; oracle: Address }
  | { type: 'FundsReleased'; projectId: number; amount: bigint; fee: bigint; recipient: Address }
  | { type: 'Refunded'; projectId: number; donationId: number; amount: bigint }
  | { type: 'ProjectExpired'; projectId: number; deadline: number }
  | { type: 'RoleGranted'; account: Address; role: Role; grantedBy: Address }
  | { type: 'RoleRevoked'; account: Address; role: Role; revokedBy: Address }
  | { type: 'SuperAdminTransferred'; previous: Address; next: Address }
  | { type: 'OracleSetUpdated'; version: number; oracles: Address[] }
  | { type: 'ProtocolFeeUpdated'; feeBps: number; recipient: Address }

export type ProtocolEventType = ProtocolEventBody['type']

export type ProtocolEvent = ProtocolEventBody & {
  sequence: number                  // Monotonic across the host's event log
  timestamp: number                 // Host time when the transaction ran
}

export type EventOf<T extends ProtocolEventType> = Extract<ProtocolEvent, { type: T }>
