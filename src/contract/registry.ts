/**
 * Project Registry — lifecycle state machine.
 *
 *   Funding ──(funded ≥ target)──▶ Active ──submitProof──▶ ProofSubmitted
 *                                    ▲                          │
 *                                    └──────── Rejected ────────┤
 *                                                               └─ Verified ─▶ Completed
 *
 *   Funding | Active | ProofSubmitted ──(now > deadline)──▶ Expired
 *
 * Completed and Expired are terminal. Functions here only touch storage and
 * events; settlement is driven from the oracle guard and the funding ledger.
 */

import { type Address, type Hex, isAddressEqual } from 'viem'
import { type Project, type RegisterProjectParams, ProjectStatus, PROJECT_STATUS_LABELS, isTerminalStatus } from '../types/project'
import { type ProofSubmission, type Verdict, VerificationResult } from '../types/proof'
import { REGISTRAR_ROLES } from '../types/access'
import { isBytes32 } from '../lib/commitment'
import type { Transaction } from './host'
import { accountKey, loadProject, nextProjectId, saveProject, saveSubmission } from './storage'
import { requireAnyRole } from './access-control'
import { fail } from './errors'

export function requireStatus(project: Project, allowed: readonly ProjectStatus[], action: string): void {
  if (!allowed.includes(project.status)) {
    fail(
      'InvalidState',
      `cannot ${action} project ${project.id} while ${PROJECT_STATUS_LABELS[project.status]}`,
    )
  }
}

export function registerProject(tx: Transaction, creator: Address, params: RegisterProjectParams): Project {
  requireAnyRole(tx.storage, creator, REGISTRAR_ROLES, 'register projects')

  if (params.target <= 0n) {
    fail('InvalidParameters', `target must be positive, got ${params.target}`)
  }
  if (!Number.isInteger(params.deadline) || params.deadline <= tx.now) {
    fail('InvalidParameters', `deadline ${params.deadline} must be after ledger time ${tx.now}`)
  }
  if (!isBytes32(params.proofSchemaHash)) {
    fail('InvalidParameters', 'proof schema hash must be 32 bytes')
  }
  const implementer = accountKey(params.implementer ?? creator)

  const project: Project = {
    id: nextProjectId(tx.storage),
    creator: accountKey(creator),
    implementer,
    target: params.target,
    funded: 0n,
    deadline: params.deadline,
    proofSchemaHash: params.proofSchemaHash,
    status: ProjectStatus.FUNDING,
    activeSubmissionId: null,
    donationCount: 0,
    settled: false,
    createdAt: tx.now,
  }
  saveProject(tx.storage, project)

  tx.emit({
    type: 'ProjectRegistered',
    projectId: project.id,
    creator: project.creator,
    implementer: project.implementer,
    target: project.target,
    deadline: project.deadline,
  })
  return project
}

/** Funding → Active once the target is met; otherwise unchanged */
export function fundReached(tx: Transaction, project: Project): Project {
  if (project.status !== ProjectStatus.FUNDING || project.funded < project.target) {
    return project
  }
  const next: Project = { ...project, status: ProjectStatus.ACTIVE }
  saveProject(tx.storage, next)
  return next
}

export function submitProof(tx: Transaction, caller: Address, projectId: number, commitment: Hex): ProofSubmission {
  const project = loadProject(tx.storage, projectId)
  requireStatus(project, [ProjectStatus.ACTIVE], 'submit proof for')

  if (!isAddressEqual(accountKey(caller), project.implementer)) {
    fail('Unauthorized', `only the implementer ${project.implementer} may submit proof`)
  }
  if (!isBytes32(commitment)) {
    fail('InvalidParameters', 'proof commitment must be 32 bytes')
  }

  const submission: ProofSubmission = {
    projectId,
    id: (project.activeSubmissionId ?? 0) + 1,
    commitment,
    submitter: accountKey(caller),
    timestamp: tx.now,
    result: VerificationResult.PENDING,
    resolvedAt: null,
  }
  saveSubmission(tx.storage, submission)
  saveProject(tx.storage, {
    ...project,
    status: ProjectStatus.PROOF_SUBMITTED,
    activeSubmissionId: submission.id,
  })

  tx.emit({ type: 'ProofSubmitted', projectId, submissionId: submission.id, commitment })
  return submission
}

/**
 * Apply an accepted verdict to the project. Verified completes it; Rejected
 * reopens it for resubmission unless the deadline has already passed.
 */
export function applyVerdict(tx: Transaction, project: Project, verdict: Verdict): Project {
  requireStatus(project, [ProjectStatus.PROOF_SUBMITTED], 'apply a verdict to')

  let status: ProjectStatus
  if (verdict === VerificationResult.VERIFIED) {
    status = ProjectStatus.COMPLETED
  } else if (tx.now > project.deadline) {
    status = ProjectStatus.EXPIRED
  } else {
    status = ProjectStatus.ACTIVE
  }

  const next: Project = { ...project, status }
  saveProject(tx.storage, next)
  if (status === ProjectStatus.EXPIRED) {
    tx.emit({ type: 'ProjectExpired', projectId: project.id, deadline: project.deadline })
  }
  return next
}

/** Any caller may poke a project past its deadline into Expired */
export function checkExpiry(tx: Transaction, projectId: number): ProjectStatus {
  const project = loadProject(tx.storage, projectId)
  if (isTerminalStatus(project.status) || tx.now <= project.deadline) {
    return project.status
  }

  saveProject(tx.storage, { ...project, status: ProjectStatus.EXPIRED })
  tx.emit({ type: 'ProjectExpired', projectId, deadline: project.deadline })
  return ProjectStatus.EXPIRED
}
