/**
 * Release/Refund Engine.
 *
 * Release pays the whole escrow of a Completed project to its implementer,
 * guarded by `project.settled` so a retried call is a no-op. Refunds are
 * per donation, each guarded by the donation's own settlement flag, so one
 * donor's refund never depends on another's.
 */

import type { Address } from 'viem'
import { type Donation, type Project, DonationSettlement, ProjectStatus } from '../types/project'
import type { Transaction } from './host'
import { listDonations, loadProject, saveDonation, saveProject } from './storage'
import { transfer } from './asset-ledger'
import { requireStatus } from './registry'
import { fail } from './errors'

export interface ReleaseResult {
  paid: bigint                      // Amount sent to the implementer
  fee: bigint                       // Amount sent to the fee recipient
}

const BPS_DENOMINATOR = 10_000n

export function computeFee(amount: bigint, feeBps: number): bigint {
  return (amount * BigInt(feeBps)) / BPS_DENOMINATOR
}

export function release(tx: Transaction, escrow: Address, projectId: number): ReleaseResult {
  const project = loadProject(tx.storage, projectId)
  requireStatus(project, [ProjectStatus.COMPLETED], 'release funds of')

  if (project.settled) {
    return { paid: 0n, fee: 0n }
  }

  const fee = tx.storage.getInstance().fee
  const feeAmount = fee ? computeFee(project.funded, fee.feeBps) : 0n
  const paid = project.funded - feeAmount

  if (paid > 0n) transfer(tx.storage, escrow, project.implementer, paid)
  if (fee && feeAmount > 0n) transfer(tx.storage, escrow, fee.recipient, feeAmount)

  for (const donation of listDonations(tx.storage, projectId)) {
    if (donation.settlement === DonationSettlement.LOCKED) {
      saveDonation(tx.storage, { ...donation, settlement: DonationSettlement.RELEASED })
    }
  }
  const settled: Project = { ...project, settled: true }
  saveProject(tx.storage, settled)

  tx.emit({
    type: 'FundsReleased',
    projectId,
    amount: paid,
    fee: feeAmount,
    recipient: project.implementer,
  })
  return { paid, fee: feeAmount }
}

/** Pay one donation back to `recipient` and mark it refunded */
export function refundDonation(tx: Transaction, escrow: Address, donation: Donation, recipient: Address): bigint {
  if (donation.settlement !== DonationSettlement.LOCKED) {
    fail('AlreadySettled', `donation ${donation.id} on project ${donation.projectId} is already settled`)
  }

  transfer(tx.storage, escrow, recipient, donation.amount)
  saveDonation(tx.storage, { ...donation, settlement: DonationSettlement.REFUNDED })
  tx.emit({ type: 'Refunded', projectId: donation.projectId, donationId: donation.id, amount: donation.amount })
  return donation.amount
}

/** Assets still locked for a project: donations neither released nor refunded */
export function escrowBalance(tx: Pick<Transaction, 'storage'>, projectId: number): bigint {
  return listDonations(tx.storage, projectId)
    .filter((donation) => donation.settlement === DonationSettlement.LOCKED)
    .reduce((sum, donation) => sum + donation.amount, 0n)
}
