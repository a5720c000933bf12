/**
 * Funding Ledger — deposits against a project and per-donation refunds.
 *
 * The donor's address only appears as the source of the asset transfer; the
 * Donation record stores the commitment, never the identity. Deposits that
 * would push `funded` past `target` are rejected outright so the
 * implementer's payout is known in advance.
 */

import type { Address, Hex } from 'viem'
import { type Donation, DonationSettlement, ProjectStatus } from '../types/project'
import { type CommitmentSecret, isBytes32, verifyCommitment } from '../lib/commitment'
import type { Transaction } from './host'
import { loadDonation, loadProject, saveDonation, saveProject } from './storage'
import { transfer } from './asset-ledger'
import { fundReached, requireStatus } from './registry'
import { refundDonation } from './settlement'
import { fail } from './errors'

export function deposit(
  tx: Transaction,
  escrow: Address,
  donor: Address,
  projectId: number,
  amount: bigint,
  donorCommitment: Hex,
): Donation {
  if (amount <= 0n) {
    fail('InvalidAmount', `deposit amount must be positive, got ${amount}`)
  }

  const project = loadProject(tx.storage, projectId)
  requireStatus(project, [ProjectStatus.FUNDING], 'deposit into')
  if (tx.now > project.deadline) {
    fail('InvalidState', `project ${projectId} passed its deadline at ${project.deadline}`)
  }
  if (project.funded + amount > project.target) {
    fail(
      'InvalidAmount',
      `deposit of ${amount} exceeds remaining capacity ${project.target - project.funded}`,
    )
  }
  if (!isBytes32(donorCommitment)) {
    fail('InvalidParameters', 'donor commitment must be 32 bytes')
  }

  transfer(tx.storage, donor, escrow, amount)

  const donation: Donation = {
    projectId,
    id: project.donationCount + 1,
    commitment: donorCommitment,
    amount,
    timestamp: tx.now,
    settlement: DonationSettlement.LOCKED,
  }
  saveDonation(tx.storage, donation)

  const funded = { ...project, funded: project.funded + amount, donationCount: donation.id }
  saveProject(tx.storage, funded)
  tx.emit({ type: 'DonationReceived', projectId, donationId: donation.id, amount })

  fundReached(tx, funded)
  return donation
}

/**
 * Refund one donation of an Expired project. The caller proves ownership by
 * revealing the commitment secret; funds go to the identity in that secret.
 */
export function refund(
  tx: Transaction,
  escrow: Address,
  projectId: number,
  donationId: number,
  secret: CommitmentSecret,
): bigint {
  const project = loadProject(tx.storage, projectId)
  requireStatus(project, [ProjectStatus.EXPIRED], 'refund donations of')

  const donation = loadDonation(tx.storage, projectId, donationId)
  if (donation.settlement !== DonationSettlement.LOCKED) {
    fail('AlreadySettled', `donation ${donationId} on project ${projectId} is already settled`)
  }
  if (!verifyCommitment(donation.commitment, secret, { kind: 'donation', amount: donation.amount })) {
    fail('Unauthorized', `secret does not open the commitment of donation ${donationId}`)
  }

  return refundDonation(tx, escrow, donation, secret.identity)
}
