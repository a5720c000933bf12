/**
 * Impact Escrow Protocol — Proof & Attestation Types
 * Shared type definitions for proof submissions and the Oracle Verifier
 */

import type { Address, Hex } from 'viem'

export enum VerificationResult {
  PENDING = 0,
  VERIFIED = 1,
  REJECTED = 2,
}

export type Verdict = VerificationResult.VERIFIED | VerificationResult.REJECTED

export interface ProofSubmission {
  projectId: number
  id: number                        // Per-project sequence, starts at 1
  commitment: Hex                   // Commitment over the raw proof payload
  submitter: Address
  timestamp: number
  result: VerificationResult
  resolvedAt: number | null
}

/** Fields covered by the oracle's EIP-712 signature */
export interface AttestationMessage {
  projectId: number
  submissionId: number
  proofCommitment: Hex
  verdict: Verdict
  timestamp: number
}

export interface SignedAttestation extends AttestationMessage {
  signature: Hex
}

export interface OracleAttestation extends SignedAttestation {
  oracle: Address                   // Recovered signer, member of the oracle set
}

// =============================================================================
// Proof schemas — the descriptor a project commits to at registration
// =============================================================================

export type ProofSchemaType = 'digest-match' | 'signed-statement' | 'evidence-document'

export interface DigestMatchSchema {
  type: 'digest-match'
  version: number
  expectedDigest: Hex               // keccak256 of the exact proof bytes
}

export interface SignedStatementSchema {
  type: 'signed-statement'
  version: number
  attester: Address                 // Account expected to sign the statement
}

export interface EvidenceDocumentSchema {
  type: 'evidence-document'
  version: number
  requiredFields: string[]          // Keys the JSON evidence document must carry
  requireEvidenceUrl: boolean       // Whether a remote artifact must be fetched
}

export type ProofSchema = DigestMatchSchema | SignedStatementSchema | EvidenceDocumentSchema

/** Raw proof as received out of band by the oracle */
export interface ProofPayload {
  data: Hex                         // Raw proof bytes
  salt: Hex                         // Commitment nonce chosen by the implementer
  submitter: Address                // Identity bound into the commitment
  signature?: Hex                   // signed-statement only
}

export interface ProofRequest {
  projectId: number
  submissionId: number
  schema: ProofSchema
  payload: ProofPayload
  receivedAt: number
}
