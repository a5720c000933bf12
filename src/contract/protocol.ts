/**
 * ============================================================================
 * Impact Escrow Protocol — Contract Facade
 * ============================================================================
 *
 * Public entry points of the escrow contract. Every state-mutating call runs
 * as one host transaction: it either commits all of its writes and events or
 * none of them. `caller` is the identity the host authenticated for the call.
 *
 * Entry points:
 *   init / grantRole / revokeRole / transferSuperAdmin / setProtocolFee
 *   registerProject → deposit → submitProof → applyVerification → release
 *   checkExpiry → refund
 */

import type { Address, Hex } from 'viem'
import type { Donation, Project, RegisterProjectParams, ProjectStatus } from '../types/project'
import type { OracleAttestation, ProofSubmission, SignedAttestation } from '../types/proof'
import type { ProtocolFee, Role } from '../types/access'
import type { CommitmentSecret } from '../lib/commitment'
import { type AttestationDomain, recoverAttestationSigner } from '../lib/attestation'
import type { ProtocolConfig } from '../lib/config'
import type { LedgerHost } from './host'
import * as access from './access-control'
import * as registry from './registry'
import * as ledger from './funding-ledger'
import * as settlement from './settlement'
import * as guard from './oracle-guard'
import * as store from './storage'
import { ProtocolError } from './errors'

/** Rows leave the contract as copies; storage only changes inside a transaction */
function view<T extends object>(row: T): T {
  return { ...row }
}

export interface ProtocolOptions {
  config: ProtocolConfig
  log?: (message: string) => void
}

export class ImpactEscrowProtocol {
  readonly address: Address
  readonly domain: AttestationDomain
  private readonly log: (message: string) => void

  constructor(
    readonly host: LedgerHost,
    options: ProtocolOptions,
  ) {
    this.address = options.config.address
    this.domain = {
      name: options.config.domainName,
      version: options.config.domainVersion,
      chainId: options.config.chainId,
      verifyingContract: options.config.address,
    }
    this.log = options.log ?? (() => {})
  }

  // ---------------------------------------------------------------------------
  // Administration
  // ---------------------------------------------------------------------------

  init(superAdmin: Address): void {
    this.host.transact((tx) => access.init(tx, superAdmin))
    this.log(`[IEP] Initialized with super admin ${superAdmin}`)
  }

  grantRole(caller: Address, account: Address, role: Role): void {
    this.host.transact((tx) => access.grantRole(tx, caller, account, role))
  }

  revokeRole(caller: Address, account: Address): void {
    this.host.transact((tx) => access.revokeRole(tx, caller, account))
  }

  transferSuperAdmin(caller: Address, next: Address): void {
    this.host.transact((tx) => access.transferSuperAdmin(tx, caller, next))
  }

  setProtocolFee(caller: Address, feeBps: number, recipient: Address): ProtocolFee {
    return view(this.host.transact((tx) => access.setProtocolFee(tx, caller, feeBps, recipient)))
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  registerProject(caller: Address, params: RegisterProjectParams): Project {
    const project = this.host.transact((tx) => registry.registerProject(tx, caller, params))
    this.log(`[IEP] Project ${project.id} registered: target=${project.target}, deadline=${project.deadline}`)
    return view(project)
  }

  deposit(caller: Address, projectId: number, amount: bigint, donorCommitment: Hex): Donation {
    const donation = this.host.transact((tx) =>
      ledger.deposit(tx, this.address, caller, projectId, amount, donorCommitment),
    )
    this.log(`[IEP] Project ${projectId} donation #${donation.id}: ${amount}`)
    return view(donation)
  }

  submitProof(caller: Address, projectId: number, proofCommitment: Hex): ProofSubmission {
    const submission = this.host.transact((tx) => registry.submitProof(tx, caller, projectId, proofCommitment))
    this.log(`[IEP] Project ${projectId} proof submission #${submission.id}: ${proofCommitment}`)
    return view(submission)
  }

  async applyVerification(caller: Address, attestation: SignedAttestation): Promise<guard.VerificationOutcome> {
    let signer: Address
    try {
      signer = await recoverAttestationSigner(this.domain, attestation)
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err)
      throw new ProtocolError('UnauthorizedOracle', `attestation signature is not recoverable: ${reason}`)
    }

    const outcome = this.host.transact((tx) => guard.applyVerification(tx, this.address, signer, attestation))
    this.log(
      `[IEP] Project ${attestation.projectId} submission #${attestation.submissionId} ` +
      `attested by ${signer} (relayed by ${caller}) → status ${outcome.status}`,
    )
    return { ...outcome, submission: view(outcome.submission) }
  }

  /** Idempotent: returns zero amounts once the project has been settled */
  release(projectId: number): settlement.ReleaseResult {
    return this.host.transact((tx) => settlement.release(tx, this.address, projectId))
  }

  checkExpiry(projectId: number): ProjectStatus {
    return this.host.transact((tx) => registry.checkExpiry(tx, projectId))
  }

  refund(projectId: number, donationId: number, secret: CommitmentSecret): bigint {
    const amount = this.host.transact((tx) => ledger.refund(tx, this.address, projectId, donationId, secret))
    this.log(`[IEP] Project ${projectId} donation #${donationId} refunded: ${amount}`)
    return amount
  }

  // ---------------------------------------------------------------------------
  // Views
  // ---------------------------------------------------------------------------

  getProject(projectId: number): Project {
    return view(store.loadProject(this.host.storage, projectId))
  }

  listProjects(): Project[] {
    return this.host.storage.projects.values().sort((a, b) => a.id - b.id).map(view)
  }

  getDonation(projectId: number, donationId: number): Donation {
    return view(store.loadDonation(this.host.storage, projectId, donationId))
  }

  listDonations(projectId: number): Donation[] {
    return store.listDonations(this.host.storage, projectId).map(view)
  }

  getSubmission(projectId: number, submissionId: number): ProofSubmission {
    return view(store.loadSubmission(this.host.storage, projectId, submissionId))
  }

  listSubmissions(projectId: number): ProofSubmission[] {
    return store.listSubmissions(this.host.storage, projectId).map(view)
  }

  getAttestation(projectId: number, submissionId: number): OracleAttestation | null {
    const attestation = guard.getAttestation(this.host, projectId, submissionId)
    return attestation && view(attestation)
  }

  escrowBalance(projectId: number): bigint {
    return settlement.escrowBalance(this.host, projectId)
  }

  roleOf(account: Address): Role | undefined {
    return access.roleOf(this.host.storage, account)
  }

  hasRole(account: Address, role: Role): boolean {
    return access.hasRole(this.host.storage, account, role)
  }

  authorizedOracles(): Address[] {
    return access.authorizedOracles(this.host.storage)
  }

  oracleSetVersion(): number {
    return this.host.storage.getInstance().oracleSetVersion
  }

  protocolFee(): ProtocolFee | null {
    const fee = this.host.storage.getInstance().fee
    return fee && view(fee)
  }
}
