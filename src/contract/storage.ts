/**
 * Contract storage: typed tables keyed by project id, plus instance state.
 *
 * Rows are replaced, never mutated in place, so a snapshot only needs to copy
 * each table's Map. `LedgerHost.transact` takes a snapshot before every call
 * and restores it when the call throws.
 */

import { type Address, getAddress, isAddress } from 'viem'
import type { Project, Donation } from '../types/project'
import type { ProofSubmission, OracleAttestation } from '../types/proof'
import type { Role, ProtocolFee } from '../types/access'
import { fail } from './errors'

export class Table<K, V> {
  private rows = new Map<K, V>()

  get(key: K): V | undefined {
    return this.rows.get(key)
  }

  set(key: K, value: V): void {
    this.rows.set(key, value)
  }

  delete(key: K): void {
    this.rows.delete(key)
  }

  has(key: K): boolean {
    return this.rows.has(key)
  }

  keys(): K[] {
    return [...this.rows.keys()]
  }

  values(): V[] {
    return [...this.rows.values()]
  }

  entries(): [K, V][] {
    return [...this.rows.entries()]
  }

  get size(): number {
    return this.rows.size
  }

  snapshot(): () => void {
    const copy = new Map(this.rows)
    return () => {
      this.rows = copy
    }
  }
}

export interface InstanceState {
  superAdmin: Address | null
  projectCount: number
  oracleSetVersion: number
  fee: ProtocolFee | null
}

type ScopedKey = `${number}:${number}`

export class ContractStorage {
  readonly projects = new Table<number, Project>()
  readonly donations = new Table<ScopedKey, Donation>()
  readonly submissions = new Table<ScopedKey, ProofSubmission>()
  readonly attestations = new Table<ScopedKey, OracleAttestation>()
  readonly roles = new Table<Address, Role>()
  readonly balances = new Table<Address, bigint>()
  private instance: InstanceState = {
    superAdmin: null,
    projectCount: 0,
    oracleSetVersion: 0,
    fee: null,
  }

  getInstance(): InstanceState {
    return this.instance
  }

  setInstance(next: InstanceState): void {
    this.instance = next
  }

  snapshot(): () => void {
    const restores = [
      this.projects.snapshot(),
      this.donations.snapshot(),
      this.submissions.snapshot(),
      this.attestations.snapshot(),
      this.roles.snapshot(),
      this.balances.snapshot(),
    ]
    const instance = this.instance
    return () => {
      for (const restore of restores) restore()
      this.instance = instance
    }
  }
}

export function scopedKey(projectId: number, id: number): ScopedKey {
  return `${projectId}:${id}`
}

/** Checksummed form of an account; malformed input is a caller error */
export function accountKey(account: Address): Address {
  if (!isAddress(account, { strict: false })) {
    fail('InvalidParameters', `${account} is not a valid address`)
  }
  return getAddress(account)
}

// ---------------------------------------------------------------------------
// Project helpers
// ---------------------------------------------------------------------------

/** Read and increment the project counter; ids start at 1 */
export function nextProjectId(storage: ContractStorage): number {
  const instance = storage.getInstance()
  const id = instance.projectCount + 1
  storage.setInstance({ ...instance, projectCount: id })
  return id
}

export function loadProject(storage: ContractStorage, projectId: number): Project {
  return storage.projects.get(projectId) ?? fail('ProjectNotFound', `project ${projectId} does not exist`)
}

export function saveProject(storage: ContractStorage, project: Project): void {
  storage.projects.set(project.id, project)
}

// ---------------------------------------------------------------------------
// Donation helpers
// ---------------------------------------------------------------------------

export function loadDonation(storage: ContractStorage, projectId: number, donationId: number): Donation {
  return (
    storage.donations.get(scopedKey(projectId, donationId)) ??
    fail('DonationNotFound', `donation ${donationId} does not exist on project ${projectId}`)
  )
}

export function saveDonation(storage: ContractStorage, donation: Donation): void {
  storage.donations.set(scopedKey(donation.projectId, donation.id), donation)
}

export function listDonations(storage: ContractStorage, projectId: number): Donation[] {
  const project = loadProject(storage, projectId)
  const out: Donation[] = []
  for (let id = 1; id <= project.donationCount; id++) {
    out.push(loadDonation(storage, projectId, id))
  }
  return out
}

// ---------------------------------------------------------------------------
// Proof submission helpers
// ---------------------------------------------------------------------------

export function loadSubmission(storage: ContractStorage, projectId: number, submissionId: number): ProofSubmission {
  return (
    storage.submissions.get(scopedKey(projectId, submissionId)) ??
    fail('SubmissionNotFound', `proof submission ${submissionId} does not exist on project ${projectId}`)
  )
}

export function saveSubmission(storage: ContractStorage, submission: ProofSubmission): void {
  storage.submissions.set(scopedKey(submission.projectId, submission.id), submission)
}

export function listSubmissions(storage: ContractStorage, projectId: number): ProofSubmission[] {
  const project = loadProject(storage, projectId)
  const last = project.activeSubmissionId ?? 0
  const out: ProofSubmission[] = []
  for (let id = 1; id <= last; id++) {
    out.push(loadSubmission(storage, projectId, id))
  }
  return out
}
