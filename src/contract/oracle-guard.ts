/**
 * On-chain entry point for oracle verdicts.
 *
 * The signer is recovered before the transaction opens (signature recovery is
 * async in viem); everything below runs inside one synchronous transaction.
 * Check order matters: an untrusted signer is rejected before anything about
 * the submission is revealed, and a replay is reported as AlreadySettled even
 * after the project has moved on.
 */

import type { Address } from 'viem'
import { ProjectStatus } from '../types/project'
import {
  type OracleAttestation,
  type ProofSubmission,
  type SignedAttestation,
  VerificationResult,
} from '../types/proof'
import type { Transaction } from './host'
import { accountKey, loadProject, loadSubmission, saveSubmission, scopedKey } from './storage'
import { isAuthorizedOracle } from './access-control'
import { applyVerdict } from './registry'
import { type ReleaseResult, release } from './settlement'
import { fail } from './errors'

export interface VerificationOutcome {
  status: ProjectStatus
  submission: ProofSubmission
  release: ReleaseResult | null     // Set when the verdict completed the project
}

export function applyVerification(
  tx: Transaction,
  escrow: Address,
  signer: Address,
  attestation: SignedAttestation,
): VerificationOutcome {
  if (!isAuthorizedOracle(tx.storage, signer)) {
    fail('UnauthorizedOracle', `${signer} is not in the authorized oracle set`)
  }

  const verdict: number = attestation.verdict
  if (verdict !== VerificationResult.VERIFIED && verdict !== VerificationResult.REJECTED) {
    fail('InvalidParameters', `verdict ${verdict} is neither Verified nor Rejected`)
  }

  const { projectId, submissionId } = attestation
  const submission = loadSubmission(tx.storage, projectId, submissionId)
  if (submission.commitment.toLowerCase() !== attestation.proofCommitment.toLowerCase()) {
    fail('InvalidParameters', `attested commitment does not match submission ${submissionId}`)
  }
  if (
    submission.result !== VerificationResult.PENDING ||
    tx.storage.attestations.has(scopedKey(projectId, submissionId))
  ) {
    fail('AlreadySettled', `submission ${submissionId} on project ${projectId} was already attested`)
  }

  const project = loadProject(tx.storage, projectId)
  if (project.activeSubmissionId !== submissionId) {
    fail('InvalidState', `submission ${submissionId} is superseded by ${project.activeSubmissionId}`)
  }

  const record: OracleAttestation = { ...attestation, oracle: accountKey(signer) }
  tx.storage.attestations.set(scopedKey(projectId, submissionId), record)

  const resolved: ProofSubmission = { ...submission, result: attestation.verdict, resolvedAt: tx.now }
  saveSubmission(tx.storage, resolved)
  tx.emit({
    type: 'ProofVerified',
    projectId,
    submissionId,
    verdict: attestation.verdict,
    oracle: record.oracle,
  })

  const next = applyVerdict(tx, project, attestation.verdict)
  const released = next.status === ProjectStatus.COMPLETED ? release(tx, escrow, projectId) : null

  return { status: next.status, submission: resolved, release: released }
}

export function getAttestation(tx: Pick<Transaction, 'storage'>, projectId: number, submissionId: number): OracleAttestation | null {
  return tx.storage.attestations.get(scopedKey(projectId, submissionId)) ?? null
}
